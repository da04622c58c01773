import { Hono } from 'hono';
import type { BrokerInfo, SessionRecord } from '../models/type';
import { connectionTable } from '../server/registry';
import { formatUptime, renderConnections } from '../server/render';

export interface ConnectionsSource {
  info(): BrokerInfo;
  sessions(): SessionRecord[];
  /** One-line summary of the broker's network listeners. */
  listeners: string;
}

const connections = (source: ConnectionsSource) => {
  const routes = new Hono();

  // Live session table, rebuilt on every request
  routes.get('/', (c) => {
    return c.html(
      renderConnections({
        time: new Date().toString(),
        uptime: formatUptime(source.info().uptime),
        listeners: source.listeners,
        table: connectionTable(source.sessions()),
      }),
    );
  });

  return routes;
};

export default connections;
