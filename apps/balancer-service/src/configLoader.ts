import * as fs from 'fs';
import * as path from 'path';
import { URL } from 'url';
import { Logger } from 'winston';
import { Config, ListenAddress, LoggingConfig, RawConfig } from './types';
import { ConfigError } from './errors';
import { parseDuration } from './duration';

const DEFAULT_PROXY_TIMEOUT = 30000;

/**
 * Largest delay Node timers accept; anything above fires after 1ms
 */
export const MAX_TIMER_DELAY = 2147483647;

const DEFAULT_LOGGING: LoggingConfig = {
  level: 'info'
};

/**
 * Loads and validates the balancer configuration file.
 * Every problem is a ConfigError; there is no fallback configuration.
 */
export class ConfigLoader {
  private configPath: string;
  private currentConfig: Config | null = null;
  private logger: Logger;

  constructor(configPath: string, logger: Logger) {
    this.configPath = path.resolve(configPath);
    this.logger = logger;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Read, parse and validate the configuration file
   * @throws ConfigError
   */
  public loadConfig(): Config {
    let configData: string;
    try {
      configData = fs.readFileSync(this.configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${this.configPath}: ${errorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined
      });
    }

    if (!configData.trim()) {
      throw new ConfigError(`Config file ${this.configPath} is empty`);
    }

    const raw = this.parseConfig(configData);
    const config = this.resolveConfig(raw);
    this.currentConfig = config;

    this.logger.debug('Loaded config', {
      path: this.configPath,
      listen: config.listen,
      servers: config.servers,
      healthCheck: config.healthCheck
    });

    return config;
  }

  public getCurrentConfig(): Config | null {
    return this.currentConfig;
  }

  /**
   * Parse JSON and check the shape of each field
   */
  private parseConfig(configData: string): RawConfig {
    let data: unknown;
    try {
      data = JSON.parse(configData);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in config file: ${errorMessage(error)}`);
    }

    if (!isRecord(data)) {
      throw new ConfigError('Config must be a JSON object');
    }

    const { port, healthCheckInterval, healthCheckTimeout, proxyTimeout, markUnhealthyOnForwardError, servers, logging } = data;

    if (!isStringOrNumber(port)) {
      throw new ConfigError('Config must contain a "port" listen address', { field: 'port' });
    }
    if (!isStringOrNumber(healthCheckInterval)) {
      throw new ConfigError('Config must contain a "healthCheckInterval"', { field: 'healthCheckInterval' });
    }
    if (healthCheckTimeout !== undefined && !isStringOrNumber(healthCheckTimeout)) {
      throw new ConfigError('"healthCheckTimeout" must be a duration', { field: 'healthCheckTimeout' });
    }
    if (proxyTimeout !== undefined && !isStringOrNumber(proxyTimeout)) {
      throw new ConfigError('"proxyTimeout" must be a duration', { field: 'proxyTimeout' });
    }
    if (markUnhealthyOnForwardError !== undefined && typeof markUnhealthyOnForwardError !== 'boolean') {
      throw new ConfigError('"markUnhealthyOnForwardError" must be a boolean', { field: 'markUnhealthyOnForwardError' });
    }
    if (!Array.isArray(servers) || !servers.every((s): s is string => typeof s === 'string')) {
      throw new ConfigError('"servers" must be an array of backend URLs', { field: 'servers' });
    }

    return {
      port,
      healthCheckInterval,
      healthCheckTimeout,
      proxyTimeout,
      markUnhealthyOnForwardError,
      servers,
      logging: this.parseLogging(logging)
    };
  }

  private parseLogging(logging: unknown): Partial<LoggingConfig> | undefined {
    if (logging === undefined) {
      return undefined;
    }
    if (!isRecord(logging)) {
      throw new ConfigError('"logging" must be an object', { field: 'logging' });
    }

    const { level, file } = logging;
    if (level !== undefined && typeof level !== 'string') {
      throw new ConfigError('"logging.level" must be a string', { field: 'logging.level' });
    }
    if (file !== undefined && typeof file !== 'string') {
      throw new ConfigError('"logging.file" must be a string', { field: 'logging.file' });
    }
    return { level, file };
  }

  /**
   * Apply defaults and convert durations, addresses and URLs
   */
  private resolveConfig(raw: RawConfig): Config {
    const listen = parseListenAddress(raw.port);

    const interval = parseDuration(raw.healthCheckInterval);
    if (interval === null || interval < 1) {
      throw new ConfigError(`Invalid health check interval: ${raw.healthCheckInterval}`, { field: 'healthCheckInterval' });
    }
    checkTimerDelay(interval, 'healthCheckInterval');

    let timeout = Math.max(1, Math.floor(interval / 2));
    if (raw.healthCheckTimeout !== undefined) {
      const configured = parseDuration(raw.healthCheckTimeout);
      if (configured === null || configured < 1) {
        throw new ConfigError(`Invalid health check timeout: ${raw.healthCheckTimeout}`, { field: 'healthCheckTimeout' });
      }
      checkTimerDelay(configured, 'healthCheckTimeout');
      if (configured >= interval) {
        throw new ConfigError('"healthCheckTimeout" must be shorter than "healthCheckInterval"', { field: 'healthCheckTimeout' });
      }
      timeout = configured;
    }

    let proxyTimeout = DEFAULT_PROXY_TIMEOUT;
    if (raw.proxyTimeout !== undefined) {
      const configured = parseDuration(raw.proxyTimeout);
      if (configured === null || configured < 1) {
        throw new ConfigError(`Invalid proxy timeout: ${raw.proxyTimeout}`, { field: 'proxyTimeout' });
      }
      checkTimerDelay(configured, 'proxyTimeout');
      proxyTimeout = configured;
    }

    this.validateServers(raw.servers);

    return {
      listen,
      servers: [...raw.servers],
      healthCheck: { interval, timeout },
      proxy: {
        timeout: proxyTimeout,
        markUnhealthyOnError: raw.markUnhealthyOnForwardError ?? false
      },
      logging: {
        level: raw.logging?.level ?? DEFAULT_LOGGING.level,
        file: raw.logging?.file ?? DEFAULT_LOGGING.file
      }
    };
  }

  /**
   * @throws ConfigError if the list is empty, has duplicates or bad URLs
   */
  private validateServers(servers: string[]): void {
    if (servers.length === 0) {
      throw new ConfigError('Config must contain at least one backend server', { field: 'servers' });
    }

    const seen = new Set<string>();
    servers.forEach((server, index) => {
      let url: URL;
      try {
        url = new URL(server);
      } catch {
        throw new ConfigError(`Invalid URL in servers[${index}]: ${server}`, { field: `servers[${index}]` });
      }
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigError(`servers[${index}] must be an http or https URL: ${server}`, { field: `servers[${index}]` });
      }
      if (seen.has(url.href)) {
        throw new ConfigError(`Duplicate backend in servers[${index}]: ${server}`, { field: `servers[${index}]` });
      }
      seen.add(url.href);
    });
  }
}

/**
 * Parse ":8080", "127.0.0.1:8080", "[::1]:8080", "8080" or 8080
 * @throws ConfigError
 */
export function parseListenAddress(value: string | number): ListenAddress {
  if (typeof value === 'number') {
    return { port: checkPort(String(value)) };
  }

  const trimmed = value.trim();
  const separator = trimmed.lastIndexOf(':');
  if (separator === -1) {
    return { port: checkPort(trimmed) };
  }

  let host = trimmed.slice(0, separator);
  const port = checkPort(trimmed.slice(separator + 1));
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  return host ? { host, port } : { port };
}

function checkPort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid listen port: ${value}`, { field: 'port' });
  }
  return port;
}

function checkTimerDelay(ms: number, field: string): void {
  if (ms > MAX_TIMER_DELAY) {
    throw new ConfigError(`"${field}" must not exceed ${MAX_TIMER_DELAY}ms`, { field });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringOrNumber(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Create a config loader
 * @param configPath path to the JSON configuration file
 * @param logger logger instance
 */
export function createConfigLoader(configPath: string, logger: Logger): ConfigLoader {
  return new ConfigLoader(configPath, logger);
}
