import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { calculateEngagementRate, meanEngagementRate, scorePost, scorePosts } from '../engagement-scorer';
import { rankPosts } from '../post-ranker';
import { assertClose, makeRecord } from './helpers';

const acme = [
  makeRecord({ id: 'post1', likeCount: 100, commentCount: 10, shareCount: 5, viewCount: 1000 }),
  makeRecord({ id: 'post2', likeCount: 50, commentCount: 5, shareCount: 2, viewCount: 2000 }),
  makeRecord({ id: 'post3', likeCount: 200, commentCount: 20, shareCount: 10, viewCount: 500 }),
];

describe('calculateEngagementRate', () => {
  it('weights comments by 2 and shares by 3 by default', () => {
    const [post1, post2, post3] = scorePosts(acme);

    assertClose(post1.engagementRate, 13.5);
    assertClose(post2.engagementRate, 3.3);
    assertClose(post3.engagementRate, 54.0);
    assert.deepEqual(
      rankPosts(scorePosts(acme)).map((post) => post.id),
      ['post3', 'post1', 'post2']
    );
  });

  it('uses custom weights', () => {
    const rate = calculateEngagementRate(acme[0], { commentWeight: 0, shareWeight: 0 });
    assertClose(rate, 10);
  });

  it('never decreases when a counter grows', () => {
    const base = makeRecord({ id: 'p', likeCount: 40, commentCount: 4, shareCount: 1, viewCount: 800 });
    const baseRate = calculateEngagementRate(base);

    for (const field of ['likeCount', 'commentCount', 'shareCount'] as const) {
      for (const increment of [1, 10, 1000]) {
        const bumped = { ...base, [field]: base[field] + increment };
        assert.ok(calculateEngagementRate(bumped) >= baseRate, `${field} + ${increment}`);
      }
    }
  });
});

describe('scorePost', () => {
  it('scores zero-view posts against a reach of 1 and flags them', () => {
    const scored = scorePost(makeRecord({ id: 'p', likeCount: 3, commentCount: 1, viewCount: 0 }));

    assert.equal(scored.engagementRate, 500);
    assert.equal(scored.assumedMinimalReach, true);
  });

  it('does not flag posts with views', () => {
    assert.equal(scorePost(acme[0]).assumedMinimalReach, false);
  });

  it('returns frozen posts', () => {
    assert.ok(Object.isFrozen(scorePost(acme[0])));
  });
});

describe('meanEngagementRate', () => {
  it('is 0 for no posts', () => {
    assert.equal(meanEngagementRate([]), 0);
  });

  it('averages the rates', () => {
    assert.equal(meanEngagementRate([{ engagementRate: 2 }, { engagementRate: 4 }]), 3);
  });
});
