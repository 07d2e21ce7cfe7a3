import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Default gateway protocol version this model is written against
 */
export const DEFAULT_GATEWAY_VERSION = 10;

/**
 * Gateway protocol configuration
 */
export interface GatewayConfig {
  /** Protocol version expected in the Ready payload's `v` field */
  version: number;
}

/**
 * Logger settings, readable without the rest of the configuration
 */
export interface LoggingConfig {
  /** Environment (development, production, test) */
  environment: string;
  /** Log level */
  logLevel: string;
  /** Directory for file log transports; console only when undefined */
  logDirectory: string | undefined;
}

/**
 * Application configuration
 */
export interface AppConfig extends LoggingConfig {
  gateway: GatewayConfig;
}

/**
 * Read only the logger settings
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return {
    environment: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
    logDirectory: env['LOG_DIR'] || undefined
  };
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawVersion = env['GATEWAY_VERSION'];
  const version = rawVersion ? parseInt(rawVersion, 10) : DEFAULT_GATEWAY_VERSION;

  if (!Number.isInteger(version) || version < 1) {
    throw new Error(`Invalid GATEWAY_VERSION: ${rawVersion}`);
  }

  return {
    gateway: {
      version
    },
    ...loadLoggingConfig(env)
  };
}

/**
 * Get gateway protocol configuration
 */
export function getGatewayConfig(): GatewayConfig {
  return loadConfig().gateway;
}
