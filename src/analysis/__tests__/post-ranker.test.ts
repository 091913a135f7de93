import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { compareScoredPosts, rankPosts, selectTopPosts } from '../post-ranker';
import { makePost, utc } from './helpers';

describe('rankPosts', () => {
  it('orders by engagement rate, highest first', () => {
    const ranked = rankPosts([
      makePost({ id: 'a', engagementRate: 1 }),
      makePost({ id: 'b', engagementRate: 7 }),
      makePost({ id: 'c', engagementRate: 3 }),
    ]);

    assert.deepEqual(
      ranked.map((post) => post.id),
      ['b', 'c', 'a']
    );
  });

  it('breaks rate ties by recency, undated posts last', () => {
    const ranked = rankPosts([
      makePost({ id: 'undated', engagementRate: 5 }),
      makePost({ id: 'old', engagementRate: 5, postedAt: utc('2025-01-01T00:00:00Z') }),
      makePost({ id: 'new', engagementRate: 5, postedAt: utc('2025-02-01T00:00:00Z') }),
    ]);

    assert.deepEqual(
      ranked.map((post) => post.id),
      ['new', 'old', 'undated']
    );
  });

  it('breaks remaining ties by the smaller id', () => {
    const when = utc('2025-01-01T00:00:00Z');
    const ranked = rankPosts([
      makePost({ id: 'b', engagementRate: 5, postedAt: when }),
      makePost({ id: 'B', engagementRate: 5, postedAt: when }),
      makePost({ id: 'a', engagementRate: 5, postedAt: when }),
    ]);

    // code-unit order puts upper case first
    assert.deepEqual(
      ranked.map((post) => post.id),
      ['B', 'a', 'b']
    );
  });

  it('gives the same order for any input permutation', () => {
    const posts = [
      makePost({ id: 'p1', engagementRate: 2 }),
      makePost({ id: 'p2', engagementRate: 2 }),
      makePost({ id: 'p3', engagementRate: 9, postedAt: utc('2025-03-01T00:00:00Z') }),
      makePost({ id: 'p4', engagementRate: 9 }),
    ];
    const expected = rankPosts(posts).map((post) => post.id);

    assert.deepEqual(
      rankPosts([...posts].reverse()).map((post) => post.id),
      expected
    );
    assert.deepEqual(
      rankPosts([posts[2], posts[0], posts[3], posts[1]]).map((post) => post.id),
      expected
    );
    assert.deepEqual(expected, ['p3', 'p4', 'p1', 'p2']);
  });

  it('does not mutate its input', () => {
    const posts = [makePost({ id: 'a', engagementRate: 1 }), makePost({ id: 'b', engagementRate: 2 })];
    rankPosts(posts);
    assert.deepEqual(
      posts.map((post) => post.id),
      ['a', 'b']
    );
  });
});

describe('compareScoredPosts', () => {
  it('is zero only for the same id', () => {
    const post = makePost({ id: 'same', engagementRate: 1 });
    assert.equal(compareScoredPosts(post, post), 0);
  });
});

describe('selectTopPosts', () => {
  const posts = [1, 2, 3].map((rate) => makePost({ id: `p${rate}`, engagementRate: rate }));

  it('returns the top n', () => {
    assert.deepEqual(
      selectTopPosts(posts, 2).map((post) => post.id),
      ['p3', 'p2']
    );
  });

  it('clamps n to what exists', () => {
    assert.equal(selectTopPosts(posts, 20).length, 3);
    assert.equal(selectTopPosts(posts, 0).length, 0);
    assert.equal(selectTopPosts([], 5).length, 0);
  });
});
