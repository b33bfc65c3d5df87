/**
 * Main configuration, resolved from the raw file contents by the config loader
 */
export interface Config {
  listen: ListenAddress;
  servers: string[];
  healthCheck: HealthCheckConfig;
  proxy: ProxyConfig;
  logging: LoggingConfig;
}

/**
 * Configuration file shape as written on disk
 */
export interface RawConfig {
  port: string | number;
  healthCheckInterval: string | number;
  healthCheckTimeout?: string | number;
  proxyTimeout?: string | number;
  markUnhealthyOnForwardError?: boolean;
  servers: string[];
  logging?: Partial<LoggingConfig>;
}

/**
 * Address the public listener binds to
 */
export interface ListenAddress {
  host?: string;
  port: number;
}

/**
 * Health check configuration (milliseconds)
 */
export interface HealthCheckConfig {
  interval: number;
  timeout: number;
}

/**
 * Forwarding configuration
 */
export interface ProxyConfig {
  timeout: number;
  markUnhealthyOnError: boolean;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: string;
  file?: string;
}

/**
 * Outcome of a single health probe. Exactly one of the fields is set.
 */
export interface ProbeResult {
  statusCode?: number;
  error?: Error;
}

/**
 * Health snapshot of one backend
 */
export interface BackendStatus {
  address: string;
  healthy: boolean;
}
