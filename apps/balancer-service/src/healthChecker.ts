import { EventEmitter } from 'events';
import { Logger } from 'winston';
import { Backend } from './backend';
import { Prober, isHealthyProbe } from './prober';
import { BackendStatus, HealthCheckConfig, ProbeResult } from './types';

/**
 * Periodic health probe for a single backend.
 *
 * Emits 'serverDown' and 'serverUp' with the backend when its flag flips.
 */
export class HealthMonitor extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private probingGeneration: number | null = null;
  private generation = 0;
  private stopped = false;

  constructor(
    private readonly backend: Backend,
    private readonly prober: Prober,
    private readonly config: HealthCheckConfig,
    private readonly logger: Logger
  ) {
    super();
  }

  /**
   * Start probing. The first probe runs one interval from now; ticks keep
   * their schedule however long a probe takes.
   */
  public start(): void {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.interval);
  }

  /**
   * Stop probing. A probe still in flight belongs to the old generation and
   * its result is dropped, even if the monitor is started again.
   */
  public stop(): void {
    this.stopped = true;
    this.generation++;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  public isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one probe and record the result on the backend
   * @returns the backend's health after this tick
   */
  public async tick(): Promise<boolean> {
    const generation = this.generation;
    if (this.probingGeneration === generation) {
      this.logger.debug(`Previous probe of ${this.backend.address} still running, skipping tick`);
      return this.backend.isHealthy();
    }

    this.probingGeneration = generation;
    let result: ProbeResult;
    try {
      result = await this.prober.probe(this.backend.address, this.config.timeout);
    } catch (error) {
      result = { error: error instanceof Error ? error : new Error(String(error)) };
    } finally {
      if (this.probingGeneration === generation) {
        this.probingGeneration = null;
      }
    }

    if (this.stopped || generation !== this.generation) {
      return this.backend.isHealthy();
    }

    const healthy = isHealthyProbe(result);
    this.logger.debug(`Health probe for ${this.backend.address}`, {
      healthy,
      statusCode: result.statusCode,
      error: result.error?.message
    });

    if (this.backend.setHealthy(healthy)) {
      if (healthy) {
        this.logger.info(`${this.backend.address} is back up`);
        this.emit('serverUp', this.backend);
      } else {
        this.logger.warn(`${this.backend.address} is down`, {
          statusCode: result.statusCode,
          error: result.error?.message
        });
        this.emit('serverDown', this.backend);
      }
    }

    return healthy;
  }
}

/**
 * Runs one independent HealthMonitor per backend
 */
export class HealthChecker extends EventEmitter {
  private readonly monitors: HealthMonitor[];
  private readonly backends: readonly Backend[];

  constructor(
    backends: readonly Backend[],
    prober: Prober,
    private readonly config: HealthCheckConfig,
    private readonly logger: Logger
  ) {
    super();
    this.monitors = backends.map(backend => {
      const monitor = new HealthMonitor(backend, prober, config, logger);
      monitor.on('serverDown', (server: Backend) => this.emit('serverDown', server));
      monitor.on('serverUp', (server: Backend) => this.emit('serverUp', server));
      return monitor;
    });
    this.backends = backends;
  }

  public start(): void {
    this.monitors.forEach(monitor => monitor.start());
    this.logger.info('Health checker started', {
      interval: this.config.interval,
      timeout: this.config.timeout,
      servers: this.backends.map(b => b.address)
    });
  }

  public stop(): void {
    this.monitors.forEach(monitor => monitor.stop());
    this.logger.info('Health checker stopped');
  }

  /**
   * Probe every backend once, concurrently
   */
  public async checkAll(): Promise<boolean[]> {
    return Promise.all(this.monitors.map(monitor => monitor.tick()));
  }

  public getMonitors(): readonly HealthMonitor[] {
    return this.monitors;
  }

  public getAllServerStatus(): BackendStatus[] {
    return this.backends.map(backend => backend.getStatus());
  }
}

/**
 * Create a health checker for the given backends
 */
export function createHealthChecker(
  backends: readonly Backend[],
  prober: Prober,
  config: HealthCheckConfig,
  logger: Logger
): HealthChecker {
  return new HealthChecker(backends, prober, config, logger);
}
