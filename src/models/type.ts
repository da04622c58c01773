import type { Duplex } from 'node:stream';
import type { SecureContextOptions } from 'node:tls';
import type { ObjectId } from 'mongodb';
import type { Logger } from '../config/logger';

export enum PermissionLevel {
  Deny = 0,
  Read = 1,
  Write = 2,
  ReadWrite = 3,
}

export type Operation = 'publish' | 'subscribe';

export type Decision = 'allow' | 'deny';

export interface AccessRule {
  filter: string;
  level: PermissionLevel;
}

export interface UserRecord {
  username: string;
  password: string;
  rules: readonly AccessRule[];
  disallowed: boolean;
}

// Global entries; client, username and remote are match patterns ('' or '*' match anything, 'abc*' matches by prefix)
export interface AuthRule {
  client: string;
  username: string;
  remote: string;
  password: string;
  allow: boolean;
}

export interface AclRule {
  client: string;
  username: string;
  remote: string;
  rules: readonly AccessRule[];
}

export interface Ledger {
  readonly users: ReadonlyMap<string, UserRecord>;
  readonly auth: readonly AuthRule[];
  readonly acl: readonly AclRule[];
}

export interface ClientIdentity {
  username: string;
  clientId?: string;
  remote?: string;
}

export interface Credentials extends ClientIdentity {
  password: string;
}

/**
 * Account injected into every ledger that lacks it, so an empty access file
 * still leaves one way in. An operational default, not a secret.
 */
export interface BootstrapCredential {
  username: string;
  password: string;
  rules: readonly AccessRule[];
}

// Documents of the `users` collection
export interface StoredUser {
  _id?: ObjectId;
  username: string;
  password: string;
  superuser: boolean;
  acls?: StoredACL[];
  createdAt?: Date;
  updatedAt?: Date;
}

export interface StoredACL {
  topic: string;
  acc: number; // 0=deny, 1=read, 2=write, 3=readwrite
}

export interface MQTTMessage {
  topic: string;
  payload: string | Buffer;
  qos?: 0 | 1 | 2;
  retain?: boolean;
}

export type ListenerState = 'created' | 'initialized' | 'serving' | 'closed';

export type EstablishFn = (listenerId: string, conn: Duplex, remote: string) => void;

export type CloseFn = (listenerId: string) => void;

/**
 * Shape every listener registered with the broker has to satisfy.
 */
export interface Listener {
  id(): string;
  address(): string;
  protocol(): string;
  init(log: Logger): Promise<void>;
  serve(establish: EstablishFn): Promise<void>;
  close(closeClients: CloseFn): Promise<void>;
}

export type TlsMaterial = Pick<SecureContextOptions, 'cert' | 'key' | 'ca'>;

export interface ListenerConfig {
  id: string;
  address: string;
  tls?: TlsMaterial | null;
}

export interface BrokerInfo {
  version: string;
  started: number;
  time: number;
  uptime: number;
  clientsConnected: number;
  clientsDisconnected: number;
  clientsMaximum: number;
  clientsTotal: number;
  messagesReceived: number;
  messagesSent: number;
  subscriptions: number;
  memoryAlloc: number;
}

export interface SessionRecord {
  clientId: string;
  username: string;
  remote: string;
  listener: string;
  protocolVersion: number;
  connectedAt: number;
  subscriptions: Map<string, number>;
}
