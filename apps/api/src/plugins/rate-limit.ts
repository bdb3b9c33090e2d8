import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@tollgate/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimiter {
  check(request: FastifyRequest): Promise<void>;
  stop(): void;
}

/**
 * Fixed-window limiter keyed by client IP. Buckets live in this process
 * only, so each instance enforces its own limit.
 */
export function createRateLimiter(opts: {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}): RateLimiter {
  const buckets = new Map<string, RateLimitBucket>();
  const now = opts.now ?? Date.now;

  const sweeper = setInterval(() => {
    const at = now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= at) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs);
  sweeper.unref();

  return {
    async check(request: FastifyRequest) {
      const key = request.ip || 'unknown';
      const at = now();

      let bucket = buckets.get(key);
      if (!bucket || bucket.resetAt <= at) {
        bucket = { count: 0, resetAt: at + opts.windowMs };
        buckets.set(key, bucket);
      }

      bucket.count++;
      if (bucket.count > opts.maxRequests) {
        logger.warn({ requestId: request.id }, 'Rate limit exceeded');
        throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later', {
          retryAfterMs: bucket.resetAt - at,
        });
      }
    },
    stop() {
      clearInterval(sweeper);
    },
  };
}
