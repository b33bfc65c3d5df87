import express, { Express, Request, Response, NextFunction } from 'express';
import * as http from 'http';
import { EventEmitter } from 'events';
import { Logger } from 'winston';
import { ListenAddress } from './types';
import { RequestRouter } from './router';
import { createRequestLogger } from './logger';

/**
 * Public HTTP listener: one catch-all route into the request router
 */
export class ProxyServer extends EventEmitter {
  private readonly app: Express;
  private server: http.Server | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    private readonly listen: ListenAddress,
    private readonly router: RequestRouter,
    private readonly logger: Logger
  ) {
    super();
    this.app = express();
    this.setupMiddleware();
  }

  /**
   * Set up middleware and the catch-all route
   */
  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(createRequestLogger(this.logger));
    this.app.use(this.router.handler());
    this.app.use(this.errorHandler.bind(this));
  }

  public getApp(): Express {
    return this.app;
  }

  /**
   * Start listening
   */
  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer(this.app);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = null;
        reject(error);
      };
      server.once('error', onError);
      server.listen(this.listen.port, this.listen.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.error('Server error:', error);
      this.emit('serverError', error);
    });

    this.logger.info(`Load balancer listening on ${this.listen.host ?? '*'}:${this.listen.port}`);
    this.emit('serverStarted');
  }

  /**
   * Stop listening
   */
  public async stop(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    this.closing = new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          this.logger.error('Error while closing server:', err);
          reject(err);
        } else {
          this.logger.info('Server closed');
          resolve();
        }
      });
    });

    try {
      await this.closing;
    } finally {
      this.closing = null;
    }
  }

  /**
   * Error handling middleware
   */
  private errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
    this.logger.error(`Error handling ${req.method} ${req.originalUrl}: ${err.message}`);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).type('text/plain').send('Internal Server Error');
  }
}

/**
 * Create the public server
 */
export function createServer(listen: ListenAddress, router: RequestRouter, logger: Logger): ProxyServer {
  return new ProxyServer(listen, router, logger);
}
