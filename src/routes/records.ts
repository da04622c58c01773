import { Hono } from 'hono';
import type { ProcessRecorder } from '../server/records';

const records = (recorder: ProcessRecorder) => {
  const routes = new Hono();

  routes.get('/', (c) => c.json(recorder.snapshot()));

  return routes;
};

export default records;
