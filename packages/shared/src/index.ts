export * from './logger/Logger';
export * from './utils/time/Clock';
export * from './utils/Retry';
export * from './utils/RateLimiter';
