import { Hono } from 'hono';
import type { BrokerInfo } from '../models/type';

const information = (info: () => BrokerInfo) => {
  const routes = new Hono();

  // Broker-wide status
  routes.get('/', (c) => {
    return c.body(JSON.stringify(info(), null, '\t'), 200, {
      'Content-Type': 'application/json; charset=UTF-8',
    });
  });

  return routes;
};

export default information;
