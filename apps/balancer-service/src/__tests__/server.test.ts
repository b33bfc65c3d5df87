import * as http from 'http';
import { EventEmitter } from 'events';
import { ProxyServer } from '../server';
import { createBackendPool } from '../balancer/backendPool';
import { RequestRouter } from '../router';
import { RecordingForwarder, testLogger } from './setup';

jest.mock('http', () => ({
  ...jest.requireActual('http'),
  createServer: jest.fn()
}));

class MockHttpServer extends EventEmitter {
  public listenError: Error | null = null;

  public listen = jest.fn((_port: number, _host: string | undefined, callback: () => void) => {
    if (this.listenError) {
      this.emit('error', this.listenError);
    } else {
      callback();
    }
    return this;
  });

  public close = jest.fn((callback: (err?: Error) => void) => {
    callback();
    return this;
  });
}

describe('ProxyServer', () => {
  let mockHttpServer: MockHttpServer;
  let router: RequestRouter;

  beforeEach(() => {
    jest.clearAllMocks();
    mockHttpServer = new MockHttpServer();
    (http.createServer as jest.Mock).mockReturnValue(mockHttpServer);
    router = new RequestRouter(createBackendPool(['http://localhost:5001']), new RecordingForwarder(), testLogger);
  });

  describe('start', () => {
    it('listens on the configured port and host', async () => {
      const server = new ProxyServer({ host: '127.0.0.1', port: 8080 }, router, testLogger);
      const started = jest.fn();
      server.on('serverStarted', started);

      await server.start();

      expect(http.createServer).toHaveBeenCalledWith(server.getApp());
      expect(mockHttpServer.listen).toHaveBeenCalledWith(8080, '127.0.0.1', expect.any(Function));
      expect(started).toHaveBeenCalledTimes(1);
    });

    it('listens on all interfaces when no host is given', async () => {
      const server = new ProxyServer({ port: 8080 }, router, testLogger);

      await server.start();

      expect(mockHttpServer.listen).toHaveBeenCalledWith(8080, undefined, expect.any(Function));
    });

    it('does not listen twice', async () => {
      const server = new ProxyServer({ port: 8080 }, router, testLogger);

      await server.start();
      await server.start();

      expect(http.createServer).toHaveBeenCalledTimes(1);
    });

    it('rejects when the port cannot be bound', async () => {
      mockHttpServer.listenError = new Error('listen EADDRINUSE: address already in use :::8080');
      const server = new ProxyServer({ port: 8080 }, router, testLogger);

      await expect(server.start()).rejects.toThrow('EADDRINUSE');
    });
  });

  describe('stop', () => {
    it('closes the listener', async () => {
      const server = new ProxyServer({ port: 8080 }, router, testLogger);

      await server.start();
      await server.stop();

      expect(mockHttpServer.close).toHaveBeenCalledTimes(1);
    });

    it('does nothing when not started', async () => {
      const server = new ProxyServer({ port: 8080 }, router, testLogger);

      await server.stop();

      expect(mockHttpServer.close).not.toHaveBeenCalled();
    });

    it('rejects when closing fails', async () => {
      mockHttpServer.close.mockImplementationOnce((callback: (err?: Error) => void) => {
        callback(new Error('Server is not running.'));
        return mockHttpServer;
      });
      const server = new ProxyServer({ port: 8080 }, router, testLogger);

      await server.start();
      await expect(server.stop()).rejects.toThrow('Server is not running.');
    });

    it('closes once when stop is called again while closing', async () => {
      let finishClose: () => void = () => undefined;
      mockHttpServer.close.mockImplementationOnce((callback: (err?: Error) => void) => {
        finishClose = () => callback();
        return mockHttpServer;
      });
      const server = new ProxyServer({ port: 8080 }, router, testLogger);
      await server.start();

      const first = server.stop();
      const second = server.stop();
      finishClose();

      await expect(Promise.all([first, second])).resolves.toEqual([undefined, undefined]);
      expect(mockHttpServer.close).toHaveBeenCalledTimes(1);
    });
  });
});
