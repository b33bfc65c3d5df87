import { Balancer } from './balancer';
import { Backend } from '../backend';
import { BackendStatus } from '../types';

/**
 * Fixed, ordered set of backends with a rotating cursor.
 *
 * Round-robin with skip: the cursor advances on every candidate, accepted or
 * not, so each healthy member is chosen exactly once per full cycle in
 * construction order. selectNext() is synchronous and therefore serialised
 * pool-wide.
 */
export class BackendPool implements Balancer {
  private readonly members: readonly Backend[];
  private cursor = 0;

  constructor(backends: Backend[]) {
    this.members = Object.freeze([...backends]);
  }

  public get size(): number {
    return this.members.length;
  }

  public selectNext(): Backend | null {
    const count = this.members.length;

    for (let step = 0; step < count; step++) {
      const candidate = this.members[this.cursor];
      this.cursor = (this.cursor + 1) % count;

      if (candidate.isHealthy()) {
        return candidate;
      }
    }

    return null;
  }

  public getBackends(): readonly Backend[] {
    return this.members;
  }

  public getStatus(): BackendStatus[] {
    return this.members.map(backend => backend.getStatus());
  }
}

/**
 * Build a pool from backend addresses, in order
 */
export function createBackendPool(addresses: string[]): BackendPool {
  return new BackendPool(addresses.map(address => new Backend(address)));
}
