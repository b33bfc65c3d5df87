import * as path from 'path';
import * as dotenv from 'dotenv';
import { Logger } from 'winston';
import { createConfigLoader } from './configLoader';
import { setupLogger, updateLogger } from './logger';
import { createHealthChecker, HealthChecker } from './healthChecker';
import { BackendPool, createBackendPool } from './balancer/backendPool';
import { Forwarder, createForwarder } from './forwarder';
import { HttpProber, Prober } from './prober';
import { RequestRouter } from './router';
import { createServer, ProxyServer } from './server';
import { Backend } from './backend';
import { Config } from './types';

dotenv.config({
  path: path.resolve(process.cwd(), '.env')
});

const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'config', 'config.json');

/**
 * Collaborators that can be replaced, mainly for tests
 */
export interface ApplicationOptions {
  logger?: Logger;
  prober?: Prober;
  forwarder?: Forwarder;
}

/**
 * Wires configuration, pool, health checking, routing and the listener
 */
export class ProxyApplication {
  public readonly config: Config;
  public readonly pool: BackendPool;
  public readonly healthChecker: HealthChecker;
  public readonly router: RequestRouter;
  private readonly server: ProxyServer;
  private readonly logger: Logger;

  /**
   * @throws ConfigError if the configuration is missing or invalid
   */
  constructor(configPath?: string, options: ApplicationOptions = {}) {
    const logger = options.logger ?? setupLogger({ level: 'info' });
    const configLoader = createConfigLoader(
      configPath || process.env.LB_CONFIG_PATH || DEFAULT_CONFIG_PATH,
      logger
    );

    this.config = configLoader.loadConfig();
    if (!options.logger) {
      updateLogger(logger, this.config.logging);
    }
    this.logger = logger;

    this.pool = createBackendPool(this.config.servers);

    this.healthChecker = createHealthChecker(
      this.pool.getBackends(),
      options.prober ?? new HttpProber(),
      this.config.healthCheck,
      this.logger
    );

    const forwarder = options.forwarder ?? createForwarder({
      timeout: this.config.proxy.timeout,
      onError: (target) => this.handleForwardError(target)
    }, this.logger);

    this.router = new RequestRouter(this.pool, forwarder, this.logger);
    this.server = createServer(this.config.listen, this.router, this.logger);
  }

  /**
   * Launch one health monitor per backend, then open the listener
   */
  public async start(): Promise<void> {
    this.healthChecker.start();
    try {
      await this.server.start();
    } catch (error) {
      this.healthChecker.stop();
      throw error;
    }
    this.logger.info('Load balancer started', {
      servers: this.config.servers,
      healthCheckInterval: this.config.healthCheck.interval
    });
  }

  /**
   * Stop health monitors and close the listener
   */
  public async stop(): Promise<void> {
    this.healthChecker.stop();
    await this.server.stop();
    this.logger.info('Load balancer stopped');
  }

  /**
   * Forwarding failures leave health to the probe cycle unless eager marking
   * is configured
   */
  private handleForwardError(target: Backend): void {
    if (!this.config.proxy.markUnhealthyOnError) {
      return;
    }
    if (target.setHealthy(false)) {
      this.logger.warn(`${target.address} is down (forwarding failed)`);
    }
  }

  /**
   * Stop, then exit with the given code. A failed stop exits with 1.
   */
  public async shutdown(reason: string, exitCode = 0): Promise<void> {
    this.logger.info(`Received ${reason}, shutting down`);
    let code = exitCode;
    try {
      await this.stop();
    } catch (error) {
      this.logger.error('Error during shutdown:', error);
      code = 1;
    }
    process.exit(code);
  }

  /**
   * Stop cleanly on termination signals; crashes exit with 1
   */
  public setupGracefulShutdown(): void {
    process.once('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });
    process.once('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      this.logger.error('Uncaught exception:', error);
      void this.shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.error('Unhandled promise rejection:', reason);
      void this.shutdown('unhandledRejection', 1);
    });
  }
}

async function main(): Promise<void> {
  try {
    const app = new ProxyApplication();
    app.setupGracefulShutdown();
    await app.start();
  } catch (error) {
    console.error('Load balancer failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export { Backend } from './backend';
export { BackendPool } from './balancer/backendPool';
export { HealthChecker, HealthMonitor } from './healthChecker';
export { RequestRouter } from './router';
export { ConfigError } from './errors';
