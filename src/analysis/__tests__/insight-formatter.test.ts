import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { aggregateCompetitorSummaries } from '../aggregator';
import { summarizeCompetitor } from '../competitor-summary';
import { FormattingError } from '../errors';
import { formatInsightPayload, truncateCaption } from '../insight-formatter';
import { resolveRunConfig } from '../run-config';
import type { ScoredPost } from '../types';
import { makePost, utc } from './helpers';

const config = resolveRunConfig({});

function aggregateOf(postsByHandle: Record<string, ScoredPost[]>) {
  const summaries = Object.entries(postsByHandle).map(([handle, posts]) => summarizeCompetitor(handle, posts, config));
  return aggregateCompetitorSummaries(summaries, config);
}

function expectMissing(fields: string[]) {
  return (error: unknown) => {
    assert.ok(error instanceof FormattingError);
    assert.deepEqual(error.missingFields, fields);
    assert.equal(error.code, 'FORMATTING_ERROR');
    return true;
  };
}

describe('truncateCaption', () => {
  it('appends an ellipsis only when the caption is cut', () => {
    assert.equal(truncateCaption('abcdef', 3), 'abc...');
    assert.equal(truncateCaption('abc', 3), 'abc');
    assert.equal(truncateCaption('x'.repeat(201)), `${'x'.repeat(200)}...`);
  });
});

describe('formatInsightPayload', () => {
  const post = makePost({
    id: 'p1',
    captionText: 'How to light a small room',
    hashtags: ['#Light'],
    postedAt: utc('2025-03-03T09:00:00Z'),
    durationSeconds: 20,
    engagementRate: 5,
    likeCount: 40,
    commentCount: 3,
    shareCount: 2,
    viewCount: 1000,
  });

  it('condenses the aggregate', () => {
    const payload = formatInsightPayload(aggregateOf({ acme: [post] }), { captionPreviewLength: 10 });

    assert.deepEqual(payload, {
      analysisSummary: {
        competitorsAnalyzed: 1,
        competitorHandles: ['acme'],
        totalReelsAnalyzed: 1,
        avgEngagementRate: 5,
      },
      patterns: {
        topHashtags: [{ hashtag: '#light', frequency: 1, avgEngagementRate: 5 }],
        hookCategories: [{ category: 'how-to', count: 1, avgEngagementRate: 5 }],
        commonHookStarters: [],
        topicThemes: [],
        bestDays: ['Monday'],
        bestHours: [9],
        bestDurations: ['15-30s'],
        bestCaptionLengths: ['0-50 chars'],
        lowConfidenceTiming: true,
        engagementCharacteristics: [],
      },
      exemplars: [{ category: 'how-to', hook: 'How to light a small room', engagementRate: 5, competitor: 'acme' }],
      topPerformingContent: [
        {
          competitor: 'acme',
          caption: 'How to lig...',
          hashtags: ['#Light'],
          engagementRate: 5,
          likes: 40,
          comments: 3,
          shares: 2,
          views: 1000,
        },
      ],
    });
  });

  it('limits the top content', () => {
    const payload = formatInsightPayload(aggregateOf({ acme: [post] }), { topContentLimit: 0 });
    assert.deepEqual(payload.topPerformingContent, []);
  });

  it('rejects an aggregate with no competitors', () => {
    assert.throws(
      () => formatInsightPayload(aggregateOf({})),
      expectMissing(['competitorHandles', 'totalReelsAnalyzed', 'hookPatterns'])
    );
  });

  it('rejects an aggregate with no posts', () => {
    assert.throws(() => formatInsightPayload(aggregateOf({ acme: [] })), expectMissing(['totalReelsAnalyzed', 'hookPatterns']));
  });

  it('rejects an aggregate with no hooks', () => {
    assert.throws(
      () => formatInsightPayload(aggregateOf({ acme: [makePost({ id: 'silent', engagementRate: 2 })] })),
      expectMissing(['hookPatterns'])
    );
  });
});
