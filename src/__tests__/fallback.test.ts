import { describe, expect, it } from 'vitest';
import { FallbackHandler, MAX_CACHE_ENTRIES, MAX_CACHE_ENTRY_BYTES } from '../fallback.js';
import type { GatewayResponse } from '../models.js';
import { createClock, START_ISO } from './helpers.js';

function response(body: string | Buffer, statusCode = 200): GatewayResponse {
  return {
    statusCode,
    headers: { 'content-type': 'text/plain' },
    body: Buffer.isBuffer(body) ? body : Buffer.from(body),
  };
}

describe('FallbackHandler', () => {
  describe('handle', () => {
    it('builds the service unavailable body for error_response', () => {
      const handler = new FallbackHandler(createClock().now);

      expect(handler.handle('svc', 'error_response')).toEqual({
        kind: 'body',
        strategy: 'error_response',
        body: {
          error: 'service_unavailable',
          message: 'Service svc is currently unavailable',
          circuit_breaker_state: 'open',
          timestamp: START_ISO,
        },
      });
    });

    it('returns the configured static body for default_response', () => {
      const handler = new FallbackHandler(createClock().now);
      const fallback = handler.handle('svc', 'default_response', { items: [], stale: true });

      expect(fallback).toEqual({ kind: 'body', strategy: 'default_response', body: { items: [], stale: true } });
    });

    it('builds a placeholder body for default_response without a static body', () => {
      const handler = new FallbackHandler(createClock().now);

      expect(handler.handle('svc', 'default_response')).toEqual({
        kind: 'body',
        strategy: 'default_response',
        body: {
          message: 'Default response - service temporarily unavailable',
          endpoint_id: 'svc',
          timestamp: START_ISO,
        },
      });
    });

    it('answers redirect with an error body', () => {
      const handler = new FallbackHandler(createClock().now);
      const fallback = handler.handle('svc', 'redirect');

      expect(fallback.kind).toBe('body');
      expect(fallback.strategy).toBe('redirect');
      if (fallback.kind === 'body') {
        expect(fallback.body.message).toBe('Service svc is unavailable - redirect not configured');
        expect(fallback.body.error).toBe('service_unavailable');
      }
    });

    it('returns the cached response for cached_response when one exists', () => {
      const clock = createClock();
      const handler = new FallbackHandler(clock.now);
      handler.cacheResponse('svc', response('{"items":[1]}'));
      clock.advance(5_000);

      const fallback = handler.handle('svc', 'cached_response');

      expect(fallback.kind).toBe('cached');
      if (fallback.kind === 'cached') {
        expect(fallback.entry.response.body.toString()).toBe('{"items":[1]}');
        expect(fallback.entry.cachedAt.toISOString()).toBe(START_ISO);
      }
    });

    it('falls back to the error body for cached_response with an empty cache', () => {
      const handler = new FallbackHandler(createClock().now);
      const fallback = handler.handle('svc', 'cached_response');

      expect(fallback.kind).toBe('body');
      expect(fallback.strategy).toBe('cached_response');
      if (fallback.kind === 'body') {
        expect(fallback.body.error).toBe('service_unavailable');
      }
    });
  });

  describe('cache', () => {
    it('refuses bodies at or above the size limit', () => {
      const handler = new FallbackHandler();

      expect(handler.cacheResponse('big', response(Buffer.alloc(MAX_CACHE_ENTRY_BYTES)))).toBe(false);
      expect(handler.cacheResponse('small', response(Buffer.alloc(MAX_CACHE_ENTRY_BYTES - 1)))).toBe(true);
      expect(handler.getCached('big')).toBeUndefined();
      expect(handler.cacheSize).toBe(1);
    });

    it('keeps one entry per endpoint', () => {
      const handler = new FallbackHandler();
      handler.cacheResponse('svc', response('first'));
      handler.cacheResponse('svc', response('second'));

      expect(handler.cacheSize).toBe(1);
      expect(handler.getCached('svc')?.response.body.toString()).toBe('second');
    });

    it('evicts the oldest entry beyond capacity', () => {
      const handler = new FallbackHandler();
      for (let i = 0; i <= MAX_CACHE_ENTRIES; i++) {
        handler.cacheResponse(`svc-${i}`, response(`body-${i}`));
      }

      expect(handler.cacheSize).toBe(MAX_CACHE_ENTRIES);
      expect(handler.getCached('svc-0')).toBeUndefined();
      expect(handler.getCached(`svc-${MAX_CACHE_ENTRIES}`)).toBeDefined();
    });

    it('treats a refreshed entry as the newest', () => {
      const handler = new FallbackHandler();
      for (let i = 0; i < MAX_CACHE_ENTRIES; i++) {
        handler.cacheResponse(`svc-${i}`, response(`body-${i}`));
      }
      handler.cacheResponse('svc-0', response('refreshed'));
      handler.cacheResponse('svc-new', response('new'));

      expect(handler.getCached('svc-0')?.response.body.toString()).toBe('refreshed');
      expect(handler.getCached('svc-1')).toBeUndefined();
    });

    it('evicts a single endpoint on request', () => {
      const handler = new FallbackHandler();
      handler.cacheResponse('svc', response('body'));
      handler.evict('svc');

      expect(handler.getCached('svc')).toBeUndefined();
      expect(handler.cacheSize).toBe(0);
    });
  });
});
