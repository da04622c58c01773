import mqtt from 'mqtt';

export interface ProbeOptions {
  url: string;
  username?: string;
  password?: string;
  clientId?: string;
  timeout?: number;
}

export interface ProbeResult {
  connected: boolean;
  error?: string;
  elapsedMs: number;
}

/**
 * Connects once with the given credentials and reports whether the broker
 * accepted them.
 */
export function probeConnection(options: ProbeOptions): Promise<ProbeResult> {
  const began = Date.now();
  return new Promise((resolve) => {
    const client = mqtt.connect(options.url, {
      username: options.username,
      password: options.password,
      clientId: options.clientId ?? `probe_${Date.now()}`,
      reconnectPeriod: 0,
      connectTimeout: options.timeout ?? 5000,
    });

    const timeout = setTimeout(() => {
      client.end(true);
      resolve({ connected: false, error: 'Connection timeout', elapsedMs: Date.now() - began });
    }, options.timeout ?? 5000);

    client.on('connect', () => {
      clearTimeout(timeout);
      client.end();
      resolve({ connected: true, elapsedMs: Date.now() - began });
    });

    client.on('error', (err) => {
      clearTimeout(timeout);
      client.end(true);
      resolve({ connected: false, error: err.message, elapsedMs: Date.now() - began });
    });
  });
}
