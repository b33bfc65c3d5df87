import * as http from 'http';
import * as https from 'https';
import { URL } from 'url';
import { ProbeResult } from './types';

/**
 * Health probe collaborator
 */
export interface Prober {
  /**
   * Check one backend. Never rejects; transport failures come back as `error`.
   */
  probe(address: string, timeoutMs: number): Promise<ProbeResult>;
}

/**
 * Header-only HTTP probe
 */
export class HttpProber implements Prober {
  public probe(address: string, timeoutMs: number): Promise<ProbeResult> {
    return new Promise<ProbeResult>((resolve) => {
      let url: URL;
      try {
        url = new URL(address);
      } catch (error) {
        resolve({ error: toError(error) });
        return;
      }

      const options: http.RequestOptions = {
        method: 'HEAD',
        timeout: timeoutMs,
        agent: false,
        headers: {
          'User-Agent': 'HealthChecker/1.0',
          'Accept': '*/*',
          'Connection': 'close'
        }
      };

      const onResponse = (res: http.IncomingMessage): void => {
        // drain so the socket is released
        res.resume();
        resolve({ statusCode: res.statusCode });
      };

      const request = url.protocol === 'https:'
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      request.on('timeout', () => {
        request.destroy(new Error(`Health probe timed out after ${timeoutMs}ms`));
      });

      request.on('error', (error) => {
        resolve({ error });
      });

      request.end();
    });
  }
}

/**
 * A probe passes on a 2xx status with no transport error
 */
export function isHealthyProbe(result: ProbeResult): boolean {
  if (result.error || result.statusCode === undefined) {
    return false;
  }
  return result.statusCode >= 200 && result.statusCode < 300;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
