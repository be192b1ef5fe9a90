import { Throttle } from '@nestjs/throttler';

/**
 * Strict rate limiting for endpoints that call the paid inference API.
 * Limits: 10 requests per minute
 */
export const StrictThrottle = () => Throttle({ default: { ttl: 60000, limit: 10 } });

/**
 * Relaxed rate limiting for static or cheap endpoints.
 * Limits: 60 requests per minute
 *
 * Use for:
 * - Privacy policy text
 * - Health checks
 */
export const RelaxedThrottle = () => Throttle({ default: { ttl: 60000, limit: 60 } });
