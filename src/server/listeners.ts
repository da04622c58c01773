import { readFile } from 'node:fs/promises';
import { createServer as createHttpServer, type Server as HttpServer } from 'node:http';
import { createServer as createHttpsServer, type Server as HttpsServer } from 'node:https';
import { createServer as createNetServer, type Server as NetServer, type Socket } from 'node:net';
import { createServer as createTlsServer } from 'node:tls';
import { WebSocketServer, createWebSocketStream } from 'ws';
import { closeServer, OneShot, SHUTDOWN_TIMEOUT, within } from './lifecycle';
import type { Logger } from '../config/logger';
import { parseAddress } from '../config/options';
import { BindError, InitError, TlsMaterialError, errorMessage } from '../models/errors';
import type { CloseFn, EstablishFn, Listener, ListenerConfig, ListenerState, TlsMaterial } from '../models/type';

export interface TlsFiles {
  cert: string;
  key: string;
  ca?: string;
}

export async function loadTlsMaterial(files: TlsFiles): Promise<TlsMaterial> {
  if (!files.cert || !files.key) {
    throw new TlsMaterialError('tls cert and key files are required');
  }
  try {
    const [cert, key, ca] = await Promise.all([
      readFile(files.cert),
      readFile(files.key),
      files.ca ? readFile(files.ca) : Promise.resolve(undefined),
    ]);
    return ca ? { cert, key, ca } : { cert, key };
  } catch (error) {
    throw new TlsMaterialError(`cannot load tls material: ${errorMessage(error)}`, { cause: error });
  }
}

function remoteOf(socket: Socket): string {
  return `${socket.remoteAddress ?? ''}:${socket.remotePort ?? ''}`;
}

function listen(server: NetServer, address: string): Promise<void> {
  const target = parseAddress(address);
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen({ host: target.host, port: target.port }, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

abstract class NetworkListener implements Listener {
  protected state: ListenerState = 'created';
  protected log: Logger | null = null;
  private readonly shutdown = new OneShot();
  private readonly sockets = new Set<Socket>();

  constructor(protected readonly config: ListenerConfig) {}

  id(): string {
    return this.config.id;
  }

  /** The configured host with the port actually bound, once listening. */
  address(): string {
    const bound = this.state === 'created' ? null : this.server().address();
    if (bound && typeof bound === 'object') {
      const address = this.config.address;
      return address.slice(0, address.lastIndexOf(':') + 1) + bound.port;
    }
    return this.config.address;
  }

  abstract protocol(): string;

  protected abstract server(): NetServer;

  protected abstract accept(establish: EstablishFn): void;

  protected abstract stop(): Promise<void>;

  async init(log: Logger): Promise<void> {
    if (this.state !== 'created') {
      throw new InitError(`listener ${this.id()} is already ${this.state}`);
    }
    this.log = log;
    try {
      await listen(this.server(), this.config.address);
    } catch (error) {
      throw new BindError(`listener ${this.id()} cannot bind ${this.config.address}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.server().on('connection', (socket: Socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
    });
    this.state = 'initialized';
  }

  serve(establish: EstablishFn): Promise<void> {
    if (this.state !== 'initialized') {
      return Promise.reject(new InitError(`listener ${this.id()} cannot serve while ${this.state}`));
    }
    this.state = 'serving';
    const server = this.server();
    server.on('error', (error) => {
      if (this.state !== 'closed') {
        this.log?.error('failed to serve.', { error, listener: this.id() });
      }
    });
    this.accept(establish);
    return new Promise((resolve) => server.once('close', () => resolve()));
  }

  close(closeClients: CloseFn): Promise<void> {
    return this.shutdown.run(async () => {
      const wasListening = this.state !== 'created';
      this.state = 'closed';
      closeClients(this.id());
      if (!wasListening) {
        return;
      }
      const stopping = this.stop();
      // connections that never sent CONNECT belong to no client
      for (const socket of this.sockets) {
        socket.destroy();
      }
      try {
        await within(stopping, SHUTDOWN_TIMEOUT, `listener ${this.id()}`);
      } catch (error) {
        this.log?.warn('listener shutdown failed', { error, listener: this.id() });
      }
    });
  }
}

/** Plain MQTT over TCP, or MQTT over TLS when tls material is given. */
export class TcpListener extends NetworkListener {
  private readonly listener: NetServer;

  constructor(config: ListenerConfig) {
    super(config);
    this.listener = config.tls ? createTlsServer({ ...config.tls }) : createNetServer();
  }

  protocol(): string {
    return this.config.tls ? 'tls' : 'tcp';
  }

  protected server(): NetServer {
    return this.listener;
  }

  protected accept(establish: EstablishFn): void {
    // tls servers hand over the socket once the handshake is done
    const event = this.config.tls ? 'secureConnection' : 'connection';
    this.listener.on(event, (socket: Socket) => establish(this.id(), socket, remoteOf(socket)));
  }

  protected stop(): Promise<void> {
    return closeServer(this.listener);
  }
}

/** MQTT over WebSocket (wss when tls material is given). */
export class WebSocketListener extends NetworkListener {
  private readonly http: HttpServer | HttpsServer;
  private wss: WebSocketServer | null = null;

  constructor(config: ListenerConfig) {
    super(config);
    this.http = config.tls ? createHttpsServer({ ...config.tls }) : createHttpServer();
  }

  protocol(): string {
    return this.config.tls ? 'wss' : 'ws';
  }

  protected server(): NetServer {
    return this.http;
  }

  protected accept(establish: EstablishFn): void {
    const wss = new WebSocketServer({ server: this.http });
    wss.on('connection', (socket, request) => {
      establish(this.id(), createWebSocketStream(socket), remoteOf(request.socket));
    });
    this.wss = wss;
  }

  protected async stop(): Promise<void> {
    if (this.wss) {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      await closeServer(this.wss);
    }
    this.http.closeAllConnections();
    await closeServer(this.http);
  }
}
