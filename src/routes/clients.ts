import { Hono } from 'hono';
import type { SessionRecord } from '../models/type';
import { describeSession } from '../server/registry';

const clients = (sessions: () => SessionRecord[]) => {
  const routes = new Hono();

  // One indented JSON document per client, newline separated
  routes.get('/', (c) => {
    const body = sessions()
      .map((session) => JSON.stringify(describeSession(session), null, 2) + '\n')
      .join('');
    return c.body(body, 200, { 'Content-Type': 'text/plain; charset=UTF-8' });
  });

  return routes;
};

export default clients;
