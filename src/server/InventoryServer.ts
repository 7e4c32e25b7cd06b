/**
 * @fileoverview HTTP front end for the filament ledger.
 *
 * createInventoryApp() builds the Express application around a LedgerServices bundle; it
 * has no listening socket, so tests drive it directly through supertest. InventoryServer
 * owns the http.Server lifecycle and emits `server-started` ({ url, port }) and
 * `server-stopped`.
 */

import { EventEmitter } from 'events';
import express, { type Express } from 'express';
import * as http from 'http';
import type { LedgerServices } from '../services/createLedgerServices';
import { AppError, ErrorCode } from '../utils/error.utils';
import { logError, logInfo, logWarning } from '../utils/logging';
import { createAPIRoutes } from './api-routes';
import { createErrorMiddleware, createNotFoundHandler, createRequestLogger } from './middleware';

const NAMESPACE = 'InventoryServer';

/**
 * Large enough for a full inventory export posted back for import
 */
export const JSON_BODY_LIMIT = '10mb';

export function createInventoryApp(services: LedgerServices): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(createRequestLogger());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use('/api', createAPIRoutes(services));
  app.use('/api', createNotFoundHandler());
  app.use(createErrorMiddleware());

  return app;
}

export class InventoryServer extends EventEmitter {
  private httpServer: http.Server | null = null;
  private port = 0;

  constructor(private readonly services: LedgerServices) {
    super();
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Port actually bound (resolves port 0 to the assigned one)
   */
  public getPort(): number {
    return this.port;
  }

  /**
   * @throws AppError NETWORK when the port is taken or not permitted
   */
  public async start(port: number, host: string): Promise<void> {
    if (this.httpServer) {
      logWarning(NAMESPACE, 'Server is already running');
      return;
    }

    const server = http.createServer(createInventoryApp(this.services));
    await this.startListening(server, port, host);
    this.httpServer = server;

    const address = server.address();
    this.port = address !== null && typeof address === 'object' ? address.port : port;

    const url = `http://${host === '0.0.0.0' ? 'localhost' : host}:${this.port}`;
    logInfo(NAMESPACE, `Ledger API running at ${url}/api`);
    this.emit('server-started', { url, port: this.port });
  }

  public async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    this.httpServer = null;
    logInfo(NAMESPACE, 'Ledger API stopped');
    this.emit('server-stopped');
  }

  private startListening(server: http.Server, port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          logError(NAMESPACE, `Port ${port} is already in use`);
          reject(new AppError(
            `Port ${port} is already in use. Choose another one with --port.`,
            ErrorCode.NETWORK,
            { port }
          ));
        } else if (err.code === 'EACCES') {
          logError(NAMESPACE, `Access denied to port ${port}`);
          reject(new AppError(
            `Access denied to port ${port}. Try a port number above 1024.`,
            ErrorCode.NETWORK,
            { port }
          ));
        } else {
          reject(err);
        }
      };

      server.once('error', onError);
      server.listen(port, host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });
  }
}
