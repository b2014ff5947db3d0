import { createHash, timingSafeEqual } from 'crypto';
import { createMiddleware } from 'hono/factory';
import type { RequestIdVariables } from 'hono/request-id';
import type { Logger } from './logger';
import type { MetricsCollector } from './metrics';

export type AppEnv = { Variables: RequestIdVariables };

function digest(s: string) {
  return createHash('sha256').update(s).digest();
}

/** Constant-time string comparison; hashing first evens out the lengths. */
export function safeEqual(a: string, b: string) {
  return timingSafeEqual(digest(a), digest(b));
}

/** Key from `X-API-Key`, else from `Authorization: Bearer …`. */
export function presentedKey(header: (name: string) => string | undefined): string | undefined {
  const direct = header('X-API-Key');
  if (direct) return direct;
  const auth = header('Authorization');
  if (auth?.startsWith('Bearer ')) {
    const token = auth.slice('Bearer '.length).trim();
    return token ? token : undefined;
  }
  return undefined;
}

/** 401 without a key, 403 with the wrong one; a no-op when no key is configured. */
export function apiKeyAuth(expected: string | undefined, logger: Logger) {
  return createMiddleware<AppEnv>(async (c, next) => {
    if (!expected) {
      await next();
      return;
    }
    const key = presentedKey(name => c.req.header(name));
    if (!key) {
      logger.warn('Request without API key', { request_id: c.get('requestId'), path: c.req.path });
      return c.json({
        success: false,
        error: 'API key required. Provide X-API-Key header or Authorization: Bearer <token>',
        request_id: c.get('requestId'),
      }, 401);
    }
    if (!safeEqual(key, expected)) {
      logger.warn('Invalid API key', { request_id: c.get('requestId'), path: c.req.path });
      return c.json({ success: false, error: 'Invalid API key', request_id: c.get('requestId') }, 403);
    }
    await next();
  });
}

/** X-Response-Time header, request metrics and one access-log line per request. */
export function accessLog(metrics: MetricsCollector, logger: Logger) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const t0 = performance.now();
    await next();
    const ms = performance.now() - t0;
    c.header('X-Response-Time', `${ms.toFixed(2)}ms`);
    metrics.recordRequest(ms, c.res.status);

    const fields = {
      request_id: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Number(ms.toFixed(2)),
    };
    if (c.res.status >= 500) logger.error('request failed', fields);
    else if (c.res.status >= 400) logger.warn('request rejected', fields);
    else logger.info('request', fields);
  });
}
