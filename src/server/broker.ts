import type { Duplex } from 'node:stream';
import Aedes from 'aedes';
import type { Client } from 'aedes';
import { SHUTDOWN_TIMEOUT, within } from './lifecycle';
import { SessionRegistry } from './registry';
import type { BrokerHook } from '../auth/hook';
import type { Logger } from '../config/logger';
import { ConfigError, InitError, errorMessage } from '../models/errors';
import type { BrokerInfo, ClientIdentity, Listener, MQTTMessage, Operation, SessionRecord } from '../models/type';

export const BROKER_VERSION = '1.0.0';

// Listener name for sessions that did not arrive through a registered listener
const LOCAL_LISTENER = 'local';

export interface BrokerOptions {
  logger: Logger;
  /** Enables publish/subscribe from inside the process. */
  insideJob?: boolean;
  connectTimeout?: number;
  queueLimit?: number;
}

export type InlineHandler = (topic: string, payload: Buffer) => void;

interface ConnectionOrigin {
  listener: string;
  remote: string;
}

/**
 * The part of the broker the orchestrator and the control plane use.
 */
export interface BrokerHost {
  addHook(hook: BrokerHook): void;
  addListener(listener: Listener): Promise<void>;
  serve(): void;
  close(): Promise<void>;
  info(): BrokerInfo;
  sessions(): SessionRecord[];
}

/**
 * An aedes engine with one auth hook, a set of listeners and a live session
 * registry.
 */
export class Broker implements BrokerHost {
  readonly registry = new SessionRegistry();
  private readonly engine: Aedes;
  private readonly log: Logger;
  private readonly listeners = new Map<string, Listener>();
  private readonly clients = new Map<string, Client>();
  private readonly origins = new WeakMap<object, ConnectionOrigin>();
  private readonly identities = new WeakMap<Client, string>();
  private readonly serving: Promise<void>[] = [];
  private hook: BrokerHook | null = null;
  private closed = false;
  private readonly started = Date.now();
  private readonly counters = {
    clientsDisconnected: 0,
    clientsMaximum: 0,
    clientsTotal: 0,
    messagesReceived: 0,
    messagesSent: 0,
  };

  constructor(private readonly options: BrokerOptions) {
    this.log = options.logger;
    this.engine = new Aedes({
      connectTimeout: options.connectTimeout,
      queueLimit: options.queueLimit,
    });
    this.watch();
  }

  addHook(hook: BrokerHook): void {
    if (this.closed) {
      throw new InitError('broker is closed');
    }
    if (this.hook) {
      throw new InitError(`hook ${this.hook.id} is already registered`);
    }
    this.hook = hook;
    this.engine.authenticate = (client, username, password, callback) => {
      const credentials = {
        clientId: client.id,
        username: username ?? '',
        password: password ? password.toString('utf8') : '',
        remote: this.originOf(client).remote,
      };
      hook.onConnectAuthenticate(credentials).then(
        (ok) => {
          if (ok) {
            this.identities.set(client, credentials.username);
          } else {
            this.log.info('client refused', { client: client.id, username: credentials.username });
          }
          callback(null, ok);
        },
        (error: unknown) => {
          this.log.error('authentication failed', { client: client.id, error: errorMessage(error) });
          callback(null, false);
        },
      );
    };
    this.engine.authorizePublish = (client, packet, callback) => {
      if (client && !this.allowed(client, packet.topic, 'publish')) {
        callback(new Error(`publish to ${packet.topic} not authorized`));
        return;
      }
      callback(null);
    };
    this.engine.authorizeSubscribe = (client, subscription, callback) => {
      if (client && !this.allowed(client, subscription.topic, 'subscribe')) {
        callback(null, null);
        return;
      }
      callback(null, subscription);
    };
    this.log.info('added hook', { hook: hook.id });
  }

  async addListener(listener: Listener): Promise<void> {
    if (this.closed) {
      throw new InitError('broker is closed');
    }
    const id = listener.id();
    if (this.listeners.has(id)) {
      throw new InitError(`listener id ${id} already exists`);
    }
    await listener.init(this.log.child({ listener: id }));
    this.listeners.set(id, listener);
    this.log.info('attached listener', { id, protocol: listener.protocol(), address: listener.address() });
  }

  /** Starts every registered listener; returns once they are accepting. */
  serve(): void {
    if (!this.hook) {
      throw new InitError('an auth hook must be added before serving');
    }
    for (const [id, listener] of this.listeners) {
      this.serving.push(
        listener.serve((listenerId, conn, remote) => this.establish(listenerId, conn, remote)).catch((error: unknown) => {
          this.log.error('listener stopped with an error', { listener: id, error: errorMessage(error) });
        }),
      );
    }
    this.log.info('broker started', { listeners: this.listeners.size });
  }

  /** Hands a new network connection to the engine. */
  establish(listenerId: string, conn: Duplex, remote: string): void {
    this.origins.set(conn, { listener: listenerId, remote });
    this.engine.handle(conn);
  }

  /** Disconnects every client that arrived through the given listener. */
  closeClients(listenerId: string): void {
    for (const session of this.registry.byListener(listenerId)) {
      this.clients.get(session.clientId)?.close();
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await Promise.all([...this.listeners.values()].map((listener) => listener.close((id) => this.closeClients(id))));
    try {
      await within(Promise.all(this.serving), SHUTDOWN_TIMEOUT, 'listeners');
    } catch (error) {
      this.log.warn('listeners still running after shutdown', { error: errorMessage(error) });
    }
    await new Promise<void>((resolve) => this.engine.close(() => resolve()));
    this.log.info('broker stopped');
  }

  info(): BrokerInfo {
    const now = Date.now();
    return {
      version: BROKER_VERSION,
      started: Math.floor(this.started / 1000),
      time: Math.floor(now / 1000),
      uptime: Math.floor((now - this.started) / 1000),
      clientsConnected: this.registry.size,
      clientsDisconnected: this.counters.clientsDisconnected,
      clientsMaximum: this.counters.clientsMaximum,
      clientsTotal: this.counters.clientsTotal,
      messagesReceived: this.counters.messagesReceived,
      messagesSent: this.counters.messagesSent,
      subscriptions: this.registry.subscriptionCount(),
      memoryAlloc: process.memoryUsage().heapUsed,
    };
  }

  sessions(): SessionRecord[] {
    return this.registry.all();
  }

  publish(message: MQTTMessage): Promise<void> {
    this.requireInline();
    return new Promise((resolve, reject) => {
      this.engine.publish(
        {
          cmd: 'publish',
          topic: message.topic,
          payload: message.payload,
          qos: message.qos ?? 0,
          retain: message.retain ?? false,
          dup: false,
        },
        (error) => (error ? reject(error) : resolve()),
      );
    });
  }

  subscribe(filter: string, handler: InlineHandler): Promise<void> {
    this.requireInline();
    return new Promise((resolve) => {
      this.engine.subscribe(
        filter,
        (packet, done) => {
          handler(packet.topic, typeof packet.payload === 'string' ? Buffer.from(packet.payload) : packet.payload);
          done();
        },
        () => resolve(),
      );
    });
  }

  private requireInline(): void {
    if (!this.options.insideJob) {
      throw new ConfigError('inline client is disabled');
    }
  }

  private originOf(client: Client): ConnectionOrigin {
    return this.origins.get(client.conn) ?? { listener: LOCAL_LISTENER, remote: '' };
  }

  private identityOf(client: Client): ClientIdentity {
    return {
      username: this.identities.get(client) ?? '',
      clientId: client.id,
      remote: this.originOf(client).remote,
    };
  }

  private allowed(client: Client, topic: string, operation: Operation): boolean {
    if (!this.hook) {
      return false;
    }
    const who = this.identityOf(client);
    const ok = this.hook.onAclCheck(who, topic, operation);
    if (!ok) {
      this.log.debug('acl denied', { client: client.id, username: who.username, topic, operation });
    }
    return ok;
  }

  private watch(): void {
    this.engine.on('client', (client) => {
      const origin = this.originOf(client);
      this.clients.set(client.id, client);
      this.registry.open({
        clientId: client.id,
        username: this.identities.get(client) ?? '',
        remote: origin.remote,
        listener: origin.listener,
        protocolVersion: Number(client.version),
      });
      this.counters.clientsTotal++;
      this.counters.clientsMaximum = Math.max(this.counters.clientsMaximum, this.registry.size);
    });
    this.engine.on('clientDisconnect', (client) => {
      // a takeover by the same client id replaces the entry before the old one disconnects
      if (this.clients.get(client.id) !== client) {
        return;
      }
      this.clients.delete(client.id);
      this.registry.close(client.id);
      this.counters.clientsDisconnected++;
    });
    this.engine.on('subscribe', (subscriptions, client) => {
      const who = this.identityOf(client);
      for (const subscription of subscriptions) {
        // only granted subscriptions are listed
        if (this.hook?.onAclCheck(who, subscription.topic, 'subscribe')) {
          this.registry.subscribe(client.id, subscription.topic, subscription.qos);
        }
      }
    });
    this.engine.on('unsubscribe', (unsubscriptions, client) => {
      for (const filter of unsubscriptions) {
        this.registry.unsubscribe(client.id, filter);
      }
    });
    this.engine.on('publish', (packet, client) => {
      if (client) {
        this.counters.messagesReceived++;
      } else if (!packet.topic.startsWith('$SYS')) {
        this.counters.messagesSent++;
      }
    });
    this.engine.on('clientError', (client, error) => {
      this.log.warn('client error', { client: client.id, error: error.message });
    });
  }
}
