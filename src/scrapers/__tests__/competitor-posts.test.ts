import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, it } from 'node:test';
import { ConfigurationError } from '../../analysis/errors';
import { Cache } from '../../utils/cache';
import { silentLogger } from '../../utils/logger';
import { RateLimiter } from '../../utils/rateLimiter';
import { collectCompetitorPosts, competitorCacheKey, type CollectOptions } from '../competitor-posts';

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown) {
  return { data, status, statusText: String(status), headers: {}, config };
}

function requestedHandle(config: InternalAxiosRequestConfig): string {
  const body: unknown = JSON.parse(String(config.data));
  if (typeof body === 'object' && body !== null && 'username' in body && Array.isArray(body.username)) {
    return String(body.username[0]);
  }
  throw new Error('unexpected actor input');
}

describe('collectCompetitorPosts', () => {
  const originalAdapter = axios.defaults.adapter;
  let dir: string;
  let requested: string[];
  let failing: Set<string>;

  function options(overrides: Partial<CollectOptions> = {}): CollectOptions {
    return {
      platform: 'instagram',
      apifyToken: 'test-secret',
      reelsPerCompetitor: 5,
      cache: new Cache(24, dir),
      rateLimiter: new RateLimiter(0, 0),
      logger: silentLogger,
      ...overrides,
    };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reel-collect-'));
    requested = [];
    failing = new Set();
    axios.defaults.adapter = async (config: InternalAxiosRequestConfig) => {
      const handle = requestedHandle(config);
      requested.push(handle);
      if (failing.has(handle)) {
        throw new AxiosError('Service unavailable', 'ERR_BAD_RESPONSE', config, null, respond(config, 503, {}));
      }
      return respond(config, 200, [{ shortCode: `${handle}-1` }]);
    };
  });

  afterEach(() => {
    axios.defaults.adapter = originalAdapter;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('scrapes every competitor and caches a clean run', async () => {
    const first = await collectCompetitorPosts(['alpha', 'beta'], options());
    const second = await collectCompetitorPosts(['alpha', 'beta'], options());

    assert.deepEqual(first, { alpha: [{ shortCode: 'alpha-1' }], beta: [{ shortCode: 'beta-1' }] });
    assert.deepEqual(second, first);
    assert.deepEqual(requested, ['alpha', 'beta']);
  });

  it('leaves a failed competitor empty and does not cache the run', async () => {
    failing.add('beta');

    const first = await collectCompetitorPosts(['alpha', 'beta'], options());

    assert.deepEqual(first, { alpha: [{ shortCode: 'alpha-1' }], beta: [] });
    assert.equal(new Cache(24, dir).get(competitorCacheKey('instagram', 5, ['alpha', 'beta'])), null);

    failing.clear();
    const retried = await collectCompetitorPosts(['alpha', 'beta'], options());

    assert.deepEqual(retried.beta, [{ shortCode: 'beta-1' }]);
    assert.deepEqual(requested, ['alpha', 'beta', 'alpha', 'beta']);
  });

  it('scrapes again on refresh', async () => {
    await collectCompetitorPosts(['alpha'], options());
    await collectCompetitorPosts(['alpha'], options({ refresh: true }));

    assert.deepEqual(requested, ['alpha', 'alpha']);
  });

  it('needs a token only when the cache misses', async () => {
    await collectCompetitorPosts(['alpha'], options());

    const cached = await collectCompetitorPosts(['alpha'], options({ apifyToken: undefined }));
    assert.deepEqual(cached, { alpha: [{ shortCode: 'alpha-1' }] });

    await assert.rejects(collectCompetitorPosts(['gamma'], options({ apifyToken: undefined })), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.issues, ['APIFY_TOKEN: missing required environment variable']);
      return true;
    });
  });

  it('asks the actor for twice the posts it keeps', async () => {
    let limit: unknown;
    axios.defaults.adapter = async (config: InternalAxiosRequestConfig) => {
      const body: unknown = JSON.parse(String(config.data));
      if (typeof body === 'object' && body !== null && 'resultsLimit' in body) limit = body.resultsLimit;
      return respond(config, 200, []);
    };

    await collectCompetitorPosts(['alpha'], options({ reelsPerCompetitor: 7 }));

    assert.equal(limit, 14);
  });
});
