export * from './models';
export * from './codecs';
export { DecodeResult, extractErrorInfo, safeDecode } from './utils/errorHandler';
export { AppConfig, GatewayConfig, LoggingConfig, DEFAULT_GATEWAY_VERSION, loadConfig, loadLoggingConfig } from './utils/config';
export { LogContext, logger } from './utils/logger';
export { WireSchemas, ValidationUtils } from './utils/validation';
