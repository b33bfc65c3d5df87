import { URL } from 'url';
import { BackendStatus } from './types';

/**
 * One proxied backend instance.
 *
 * The health flag is private state; every read and write goes through
 * isHealthy()/setHealthy(), which run synchronously and so cannot interleave
 * with a selection or another write.
 */
export class Backend {
  public readonly address: string;
  public readonly url: URL;
  private healthy = true;

  constructor(address: string) {
    this.address = address;
    this.url = new URL(address);
  }

  public isHealthy(): boolean {
    return this.healthy;
  }

  /**
   * @returns true if the flag changed
   */
  public setHealthy(healthy: boolean): boolean {
    const changed = this.healthy !== healthy;
    this.healthy = healthy;
    return changed;
  }

  public getStatus(): BackendStatus {
    return { address: this.address, healthy: this.healthy };
  }
}
