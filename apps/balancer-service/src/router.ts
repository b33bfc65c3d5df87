import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { Logger } from 'winston';
import { Balancer } from './balancer/balancer';
import { Forwarder } from './forwarder';

/**
 * Response header naming the backend chosen for the request
 */
export const BACKEND_HEADER = 'X-Forwarded-Server';

export const NO_BACKEND_MESSAGE = 'no healthy server available';

/**
 * Request entry point: pick a backend, then hand off to the forwarder
 */
export class RequestRouter {
  constructor(
    private readonly balancer: Balancer,
    private readonly forwarder: Forwarder,
    private readonly logger: Logger
  ) {}

  public route(req: Request, res: Response, next: NextFunction): void {
    const backend = this.balancer.selectNext();

    if (!backend) {
      this.logger.warn(`No healthy backend for ${req.method} ${req.originalUrl}`);
      res.status(503).type('text/plain').send(NO_BACKEND_MESSAGE);
      return;
    }

    res.setHeader(BACKEND_HEADER, backend.address);
    this.forwarder.forward(req, res, next, backend);
  }

  /**
   * Express handler bound to this router
   */
  public handler(): RequestHandler {
    return (req, res, next) => this.route(req, res, next);
  }
}
