export { createApp } from './app';
export type { AppDeps } from './app';
export { loadConfig, ConfigError } from './config';
export type { ServiceConfig, LogLevel, Env } from './config';
export { createLogger, consoleSink } from './logger';
export type { Logger, LogFields, LogSink, LoggerOpts } from './logger';
export { MetricsCollector } from './metrics';
export type { MetricsSnapshot } from './metrics';
export { apiKeyAuth, accessLog, safeEqual, presentedKey } from './middleware';
export type { AppEnv } from './middleware';
