import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { countHashtags, mergeHashtagStats, normalizeHashtag, rankHashtags } from '../hashtag-analyzer';
import type { HashtagStat } from '../types';
import { makePost } from './helpers';

function stat(hashtag: string, frequency: number, engagementSum: number): HashtagStat {
  return { hashtag, frequency, engagementSum, meanEngagementRate: engagementSum / frequency };
}

describe('normalizeHashtag', () => {
  it('folds case and keeps a single leading #', () => {
    assert.equal(normalizeHashtag('  ##FitLife '), '#fitlife');
    assert.equal(normalizeHashtag('gym'), '#gym');
    assert.equal(normalizeHashtag('#'), '');
  });
});

describe('countHashtags', () => {
  it('counts each tag once per post regardless of case', () => {
    const stats = countHashtags([
      makePost({ id: 'p1', hashtags: ['#fit', '#FIT'], engagementRate: 4 }),
      makePost({ id: 'p2', hashtags: ['#gym', 'fit'], engagementRate: 2 }),
    ]);

    assert.deepEqual(stats, [
      { hashtag: '#fit', frequency: 2, engagementSum: 6, meanEngagementRate: 3 },
      { hashtag: '#gym', frequency: 1, engagementSum: 2, meanEngagementRate: 2 },
    ]);
  });

  it('returns nothing for posts without hashtags', () => {
    assert.deepEqual(countHashtags([makePost({ id: 'p1' })]), []);
  });
});

describe('rankHashtags', () => {
  const stats = [stat('#a', 2, 2), stat('#b', 2, 10), stat('#c', 3, 0), stat('#d', 2, 10)];

  it('orders by frequency, then mean engagement, then spelling', () => {
    assert.deepEqual(
      rankHashtags(stats).map((entry) => entry.hashtag),
      ['#c', '#b', '#d', '#a']
    );
  });

  it('trims to the limit', () => {
    assert.deepEqual(
      rankHashtags(stats, 2).map((entry) => entry.hashtag),
      ['#c', '#b']
    );
  });
});

describe('mergeHashtagStats', () => {
  it('sums frequencies and engagement before taking the mean', () => {
    const merged = mergeHashtagStats([[stat('#fit', 2, 6)], [stat('#fit', 1, 9), stat('#gym', 1, 1)]]);

    assert.deepEqual(merged, [
      { hashtag: '#fit', frequency: 3, engagementSum: 15, meanEngagementRate: 5 },
      { hashtag: '#gym', frequency: 1, engagementSum: 1, meanEngagementRate: 1 },
    ]);
  });
});
