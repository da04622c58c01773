import type { SessionRecord } from '../models/type';

// Sessions on these are the broker's own and never shown
const LOCAL_LISTENER = 'local';
const INLINE_CLIENT = 'inline';

export interface SessionOpen {
  clientId: string;
  username: string;
  remote: string;
  listener: string;
  protocolVersion: number;
  connectedAt?: number;
}

/**
 * Live view of connected clients, kept current from broker events.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();

  open(session: SessionOpen): SessionRecord {
    const record: SessionRecord = {
      ...session,
      connectedAt: session.connectedAt ?? Date.now(),
      subscriptions: new Map(),
    };
    this.sessions.set(record.clientId, record);
    return record;
  }

  close(clientId: string): boolean {
    return this.sessions.delete(clientId);
  }

  subscribe(clientId: string, filter: string, qos: number): void {
    this.sessions.get(clientId)?.subscriptions.set(filter, qos);
  }

  unsubscribe(clientId: string, filter: string): void {
    this.sessions.get(clientId)?.subscriptions.delete(filter);
  }

  get(clientId: string): SessionRecord | undefined {
    return this.sessions.get(clientId);
  }

  all(): SessionRecord[] {
    return [...this.sessions.values()];
  }

  byListener(listener: string): SessionRecord[] {
    return this.all().filter((session) => session.listener === listener);
  }

  subscriptionCount(): number {
    let total = 0;
    for (const session of this.sessions.values()) {
      total += session.subscriptions.size;
    }
    return total;
  }

  get size(): number {
    return this.sessions.size;
  }
}

export interface ConnectionRow {
  username: string;
  clientId: string;
  remote: string;
  protocolVersion: number;
  listener: string;
  subscriptionCount: number;
  subscriptions: string;
}

export interface ConnectionTable {
  rows: ConnectionRow[];
  counts: string;
  total: number;
}

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Snapshot for the connection page: broker-internal sessions dropped, rows
 * ordered by username then client id, subscriptions sorted one per line.
 */
export function connectionTable(sessions: Iterable<SessionRecord>): ConnectionTable {
  const rows: ConnectionRow[] = [];
  const counts = new Map<string, number>();
  for (const session of sessions) {
    if (session.listener === LOCAL_LISTENER || session.clientId === INLINE_CLIENT) {
      continue;
    }
    const filters = [...session.subscriptions.keys()].sort(byText);
    rows.push({
      username: session.username,
      clientId: session.clientId,
      remote: session.remote,
      protocolVersion: session.protocolVersion,
      listener: session.listener,
      subscriptionCount: filters.length,
      subscriptions: filters.join('\n'),
    });
    counts.set(session.listener, (counts.get(session.listener) ?? 0) + 1);
  }
  rows.sort((a, b) => byText(a.username, b.username) || byText(a.clientId, b.clientId));
  const summary = [...counts]
    .map(([listener, count]) => `${listener}: ${count}`)
    .sort(byText)
    .join('; ');
  return { rows, counts: summary, total: rows.length };
}

/** Plain-object form of a session, for JSON output. */
export function describeSession(session: SessionRecord): Record<string, unknown> {
  return {
    clientId: session.clientId,
    username: session.username,
    remote: session.remote,
    listener: session.listener,
    protocolVersion: session.protocolVersion,
    connectedAt: new Date(session.connectedAt).toISOString(),
    subscriptions: Object.fromEntries(session.subscriptions),
  };
}
