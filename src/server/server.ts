import { Broker, type BrokerHost, type InlineHandler } from './broker';
import { ControlPlaneListener, type ControlPlaneOptions } from './listener';
import { OneShot } from './lifecycle';
import { loadTlsMaterial, TcpListener, WebSocketListener } from './listeners';
import { AllowHook, AuthHook, type BrokerHook } from '../auth/hook';
import { credentialSnapshot } from '../auth/ledger';
import type { Logger } from '../config/logger';
import { normalizeAddress, type ConfigFile } from '../config/options';
import { BindError, InitError, errorMessage } from '../models/errors';
import type { Ledger, Listener, ListenerConfig, MQTTMessage, TlsMaterial } from '../models/type';

export interface ServerOptions {
  logger: Logger;
  /** Users and rules; `null` or absent disables authentication. */
  ledger?: Ledger | null;
  disableAuth?: boolean;
  mqttAddress?: string | number;
  tlsAddress?: string | number;
  wsAddress?: string | number;
  webAddress?: string | number;
  /** Used as is; otherwise cert/key/rootCa are read from disk. */
  tls?: TlsMaterial | null;
  cert?: string;
  key?: string;
  rootCa?: string;
  insideJob?: boolean;
  connectTimeout?: number;
  queueLimit?: number;
}

export interface ListenerFactory {
  tcp(config: ListenerConfig): Listener;
  websocket(config: ListenerConfig): Listener;
  http(config: ListenerConfig, options: ControlPlaneOptions): Listener;
}

export const defaultListeners: ListenerFactory = {
  tcp: (config) => new TcpListener(config),
  websocket: (config) => new WebSocketListener(config),
  http: (config, options) => new ControlPlaneListener(config, options),
};

export interface ServerDeps {
  broker?: BrokerHost;
  listeners?: ListenerFactory;
}

export function serverOptionsFromConfig(config: ConfigFile): Omit<ServerOptions, 'logger'> {
  return {
    mqttAddress: config.port_mqtt,
    tlsAddress: config.port_tls,
    wsAddress: config.port_ws,
    webAddress: config.port_web,
    cert: config.tls_cert_file,
    key: config.tls_key_file,
    rootCa: config.tls_ca_file,
    connectTimeout: config.connect_timeout,
    queueLimit: config.queue_limit,
  };
}

/**
 * Assembles the broker: auth hook, then TLS, MQTT, WebSocket and HTTP
 * listeners. Only the auth hook is mandatory; a listener that cannot bind is
 * logged and left out.
 */
export class MqttServer {
  private readonly log: Logger;
  private readonly broker: BrokerHost;
  private readonly inline: Broker | null;
  private readonly factory: ListenerFactory;
  private readonly stopping = new OneShot();
  private readonly active: string[] = [];
  private running = false;
  private started = false;
  private resolveStopped: () => void = () => {};
  private readonly stopped: Promise<void>;

  constructor(
    private readonly options: ServerOptions,
    deps: ServerDeps = {},
  ) {
    this.log = options.logger;
    if (deps.broker) {
      this.broker = deps.broker;
      this.inline = deps.broker instanceof Broker ? deps.broker : null;
    } else {
      const broker = new Broker({
        logger: options.logger,
        insideJob: options.insideJob,
        connectTimeout: options.connectTimeout,
        queueLimit: options.queueLimit,
      });
      this.broker = broker;
      this.inline = broker;
    }
    this.factory = deps.listeners ?? defaultListeners;
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  private authDisabled(): boolean {
    return Boolean(this.options.disableAuth) || !this.options.ledger;
  }

  /** Registers the hook and listeners and starts serving. */
  async start(): Promise<void> {
    if (this.started) {
      throw new InitError('server already started');
    }
    this.started = true;

    const ledger = this.authDisabled() ? null : (this.options.ledger ?? null);
    const hook: BrokerHook = ledger ? new AuthHook(ledger) : new AllowHook();
    try {
      this.broker.addHook(hook);
    } catch (error) {
      this.log.error('config auth error: ' + errorMessage(error));
      throw error;
    }
    if (!ledger) {
      this.log.warn('authentication is disabled, every client may connect');
    }

    const tlsAddress = normalizeAddress(this.options.tlsAddress);
    const mqttAddress = normalizeAddress(this.options.mqttAddress);
    const wsAddress = normalizeAddress(this.options.wsAddress);
    const webAddress = normalizeAddress(this.options.webAddress);

    let tls = this.options.tls ?? null;
    if (!tls && (tlsAddress || wsAddress)) {
      try {
        tls = await loadTlsMaterial({ cert: this.options.cert ?? '', key: this.options.key ?? '', ca: this.options.rootCa });
      } catch (error) {
        this.log.warn(errorMessage(error));
      }
    }

    if (tlsAddress && tls) {
      await this.attach('MQTT+TLS', this.factory.tcp({ id: 'mqtt+tls', address: tlsAddress, tls }));
    } else if (tlsAddress) {
      this.log.warn('MQTT+TLS service skipped, no tls material');
    }
    if (mqttAddress) {
      await this.attach('MQTT', this.factory.tcp({ id: 'mqtt', address: mqttAddress }));
    }
    if (wsAddress) {
      await this.attach('WS', this.factory.websocket({ id: 'ws', address: wsAddress, tls }));
    }
    if (webAddress) {
      const listener = this.factory.http(
        { id: 'web', address: webAddress },
        {
          source: this.broker,
          credentials: ledger ? credentialSnapshot(ledger) : new Map(),
          listeners: this.active.join('; '),
        },
      );
      await this.attach('HTTP', listener);
    }

    this.broker.serve();
    this.running = true;
  }

  private async attach(label: string, listener: Listener): Promise<void> {
    try {
      await this.broker.addListener(listener);
      this.active.push(`${listener.id()}: ${listener.address()}`);
    } catch (error) {
      const failure =
        error instanceof BindError ? error : new BindError(errorMessage(error), { cause: error });
      this.log.error(`${label} service error: ${failure.message}`, { code: failure.code });
    }
  }

  /** Starts and resolves once the server has been stopped. */
  async run(): Promise<void> {
    try {
      await this.start();
    } catch (error) {
      this.running = false;
      throw error;
    }
    await this.stopped;
  }

  stop(): Promise<void> {
    return this.stopping.run(async () => {
      try {
        await this.broker.close();
      } finally {
        this.running = false;
        this.resolveStopped();
      }
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Listener ids and addresses that bound successfully. */
  listeners(): string[] {
    return [...this.active];
  }

  publish(topic: string, payload: string | Buffer, qos: MQTTMessage['qos'] = 0): Promise<void> {
    return this.inlineBroker().publish({ topic, payload, qos, retain: false });
  }

  subscribe(filter: string, handler: InlineHandler): Promise<void> {
    return this.inlineBroker().subscribe(filter, handler);
  }

  private inlineBroker(): Broker {
    if (!this.inline) {
      throw new InitError('inline client needs the built-in broker');
    }
    return this.inline;
  }
}
