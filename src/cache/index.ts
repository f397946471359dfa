export { RequestCache, type CacheFetchOptions, type CacheStats, type RequestCacheOptions } from './request-cache';
export { RateLimiter, type LimitPolicy, type RateLimitState, type QuotaTicket } from './rate-limiter';
export { canonicalSignature, signatureKey, type RequestSignature, type SignatureParams } from './signature';
