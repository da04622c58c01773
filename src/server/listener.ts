import { createServer as createHttpsServer } from 'node:https';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { closeServer, OneShot, SHUTDOWN_TIMEOUT, within } from './lifecycle';
import { ProcessRecorder } from './records';
import type { Logger } from '../config/logger';
import { parseAddress, type BindTarget } from '../config/options';
import { credentialAuth } from '../middleware/auth';
import { InitError, errorMessage } from '../models/errors';
import type {
  BrokerInfo,
  CloseFn,
  EstablishFn,
  Listener,
  ListenerConfig,
  ListenerState,
  SessionRecord,
  TlsMaterial,
} from '../models/type';
import clients from '../routes/clients';
import connections from '../routes/connections';
import information from '../routes/information';
import records from '../routes/records';

/** The running HTTP server, as far as the listener needs it. */
export interface HttpServerHandle {
  close(callback?: (error?: Error) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
}

export type ServerFactory = (app: Hono, target: BindTarget, tls: TlsMaterial | null) => HttpServerHandle;

export const nodeServerFactory: ServerFactory = (app, target, tls) => {
  if (tls) {
    return serve({
      fetch: app.fetch,
      port: target.port,
      hostname: target.host,
      createServer: createHttpsServer,
      serverOptions: { ...tls },
    });
  }
  return serve({ fetch: app.fetch, port: target.port, hostname: target.host });
};

export interface ControlPlaneSource {
  info(): BrokerInfo;
  sessions(): SessionRecord[];
}

export interface ControlPlaneOptions {
  source: ControlPlaneSource;
  /** Username → password snapshot checked by Basic-Auth. */
  credentials: ReadonlyMap<string, string>;
  /** Summary of the broker's MQTT listeners shown on the connection page. */
  listeners?: string;
  recorder?: ProcessRecorder;
  startServer?: ServerFactory;
  shutdownTimeout?: number;
}

/**
 * Read-only HTTP diagnostics for the broker, registered like any other
 * listener.
 */
export class ControlPlaneListener implements Listener {
  private state: ListenerState = 'created';
  private log: Logger | null = null;
  private app: Hono | null = null;
  private server: HttpServerHandle | null = null;
  private readonly shutdown = new OneShot();
  private readonly recorder: ProcessRecorder;
  private readonly startServer: ServerFactory;

  constructor(
    private readonly config: ListenerConfig,
    private readonly options: ControlPlaneOptions,
  ) {
    this.recorder = options.recorder ?? new ProcessRecorder({ name: 'MQTT Broker' });
    this.startServer = options.startServer ?? nodeServerFactory;
  }

  id(): string {
    return this.config.id;
  }

  address(): string {
    return this.config.address;
  }

  protocol(): string {
    return this.config.tls ? 'https' : 'http';
  }

  get current(): ListenerState {
    return this.state;
  }

  async init(log: Logger): Promise<void> {
    if (this.state !== 'created') {
      throw new InitError(`listener ${this.id()} is already ${this.state}`);
    }
    this.log = log;
    this.app = this.routes(log);
    this.recorder.start();
    this.state = 'initialized';
  }

  /** The request handler; available after init. */
  handler(): Hono {
    if (!this.app) {
      throw new InitError(`listener ${this.id()} is not initialized`);
    }
    return this.app;
  }

  serve(_establish: EstablishFn): Promise<void> {
    if (this.state !== 'initialized') {
      return Promise.reject(new InitError(`listener ${this.id()} cannot serve while ${this.state}`));
    }
    this.state = 'serving';
    const server = this.startServer(this.handler(), parseAddress(this.config.address), this.config.tls ?? null);
    this.server = server;
    return new Promise((resolve) => {
      server.on('error', (error) => {
        // once closed, errors come from the shutdown itself
        if (!this.shutdown.fired) {
          this.log?.error('failed to serve.', { error, listener: this.id() });
        }
        resolve();
      });
      server.once('close', () => resolve());
    });
  }

  close(closeClients: CloseFn): Promise<void> {
    return this.shutdown.run(async () => {
      this.state = 'closed';
      this.recorder.stop();
      const server = this.server;
      if (server) {
        try {
          await within(closeServer(server), this.options.shutdownTimeout ?? SHUTDOWN_TIMEOUT, `listener ${this.id()}`);
        } catch (error) {
          this.log?.warn('listener shutdown failed', { error: errorMessage(error), listener: this.id() });
        }
      }
      closeClients(this.id());
    });
  }

  private routes(log: Logger): Hono {
    const { source, credentials } = this.options;
    const app = new Hono();
    const auth = credentialAuth(credentials);

    app.use('*', logger((line) => log.info(line)));
    app.use('/information', auth);
    app.use('/connections', auth);
    app.use('/clientsrawdata', auth);
    app.use('/processrecords', auth);

    app.route('/information', information(() => source.info()));
    app.route('/connections', connections({
      info: () => source.info(),
      sessions: () => source.sessions(),
      listeners: this.options.listeners ?? '',
    }));
    app.route('/clientsrawdata', clients(() => source.sessions()));
    app.route('/processrecords', records(this.recorder));

    app.onError((error, c) => {
      if (error instanceof HTTPException) {
        return error.getResponse();
      }
      log.error('control plane request failed', { path: c.req.path, error: error.message });
      return c.text('Internal Server Error', 500);
    });
    return app;
  }
}
