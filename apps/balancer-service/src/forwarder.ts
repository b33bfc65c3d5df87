import * as http from 'http';
import type { Socket } from 'net';
import type { NextFunction, Request, Response } from 'express';
import { createProxyMiddleware, Options as ProxyOptions, RequestHandler as ProxyHandler } from 'http-proxy-middleware';
import { Logger } from 'winston';
import { Backend } from './backend';

/**
 * Forwarding collaborator: relays one request to a chosen backend
 */
export interface Forwarder {
  forward(req: Request, res: Response, next: NextFunction, target: Backend): void;
}

export interface HttpForwarderOptions {
  /** Forwarding timeout in milliseconds */
  timeout: number;
  /** Called after a forwarding error has been answered */
  onError?: (target: Backend, error: Error) => void;
}

/**
 * Forwarder backed by http-proxy-middleware, one proxy instance per backend
 */
export class HttpForwarder implements Forwarder {
  private proxies: Map<string, ProxyHandler> = new Map();

  constructor(
    private readonly options: HttpForwarderOptions,
    private readonly logger: Logger
  ) {}

  public forward(req: Request, res: Response, next: NextFunction, target: Backend): void {
    const proxy = this.getProxy(target);
    Promise.resolve(proxy(req, res, next)).catch((error: unknown) => {
      next(error);
    });
  }

  /**
   * Get or create the proxy middleware for a backend
   */
  private getProxy(target: Backend): ProxyHandler {
    const existing = this.proxies.get(target.address);
    if (existing) {
      return existing;
    }

    const proxyOptions: ProxyOptions = {
      target: target.address,
      changeOrigin: true,
      xfwd: true,
      proxyTimeout: this.options.timeout,
      timeout: this.options.timeout,
      on: {
        error: (err, req, res) => {
          this.logger.error(`Forwarding to ${target.address} failed: ${err.message}`, {
            method: req.method,
            url: req.url
          });
          this.handleProxyError(res, err);
          this.options.onError?.(target, err);
        }
      }
    };

    const proxy = createProxyMiddleware(proxyOptions);
    this.proxies.set(target.address, proxy);
    return proxy;
  }

  /**
   * Answer a failed forward with 502, or drop the connection if the response
   * has already started
   */
  private handleProxyError(res: http.ServerResponse | Socket, err: Error): void {
    if (!(res instanceof http.ServerResponse)) {
      res.destroy();
      return;
    }

    if (res.headersSent) {
      res.destroy();
      return;
    }

    res.writeHead(502, {
      'Content-Type': 'application/json'
    });
    res.end(JSON.stringify({
      error: 'Bad Gateway',
      message: err.message
    }));
  }
}

/**
 * Create the HTTP forwarder
 */
export function createForwarder(options: HttpForwarderOptions, logger: Logger): HttpForwarder {
  return new HttpForwarder(options, logger);
}
