import { Backend } from '../backend';

/**
 * Load balancer interface
 */
export interface Balancer {
  /**
   * Pick the backend for the next request
   * @returns a healthy backend, or null if none is available
   */
  selectNext(): Backend | null;

  /**
   * All members, in selection order
   */
  getBackends(): readonly Backend[];
}
