import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { ConfigurationError } from '../errors';
import { normalizeHandle, resolveRunConfig } from '../run-config';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    assert.ok(error instanceof ConfigurationError);
    return error.issues;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolveRunConfig', () => {
  it('fills in defaults', () => {
    assert.deepEqual(resolveRunConfig(), {
      competitorUsernames: [],
      autoDiscoverCompetitors: true,
      minCompetitors: 3,
      reelsPerCompetitor: 20,
      engagementWeights: { commentWeight: 2, shareWeight: 3 },
      topHashtagsLimit: 10,
      hookMaxLength: 100,
      minBucketSampleSize: 3,
      topReelsPerCompetitor: 5,
      maxThemes: 5,
    });
  });

  it('normalizes and de-duplicates handles in order', () => {
    const config = resolveRunConfig({ competitorUsernames: ['@Acme', 'beta', 'acme', ' Gamma '] });
    assert.deepEqual(config.competitorUsernames, ['acme', 'beta', 'gamma']);
  });

  it('returns a frozen config', () => {
    const config = resolveRunConfig({ engagementWeights: { commentWeight: 1, shareWeight: 1 } });
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.engagementWeights));
  });

  it('names the offending field', () => {
    const issues = issuesOf(() => resolveRunConfig({ reelsPerCompetitor: 0 }));
    assert.equal(issues.length, 1);
    assert.ok(issues[0].startsWith('reelsPerCompetitor: '), issues[0]);
  });

  it('reports every problem at once', () => {
    const issues = issuesOf(() =>
      resolveRunConfig({ minCompetitors: 0, engagementWeights: { commentWeight: 2, shareWeight: -1 } })
    );
    assert.equal(issues.length, 2);
    assert.ok(issues[0].startsWith('minCompetitors: '), issues[0]);
    assert.ok(issues[1].startsWith('engagementWeights.shareWeight: '), issues[1]);
  });

  it('rejects unknown keys', () => {
    const input = { reelsPerCompetitor: 5, colour: 'blue' };
    const issues = issuesOf(() => resolveRunConfig(input));
    assert.equal(issues.length, 1);
    assert.ok(issues[0].startsWith('(root): '), issues[0]);
    assert.ok(issues[0].includes('colour'), issues[0]);
  });

  it('rejects blank handles', () => {
    const issues = issuesOf(() => resolveRunConfig({ competitorUsernames: ['ok', '  '] }));
    assert.equal(issues.length, 1);
    assert.ok(issues[0].startsWith('competitorUsernames.1: '), issues[0]);
  });

  it('puts the issues in the error message', () => {
    assert.throws(() => resolveRunConfig({ maxThemes: 0 }), /^ConfigurationError: Invalid configuration: maxThemes: /);
  });
});

describe('normalizeHandle', () => {
  it('lower-cases and strips leading @', () => {
    assert.equal(normalizeHandle('  @@Studio.FitLab '), 'studio.fitlab');
  });
});
