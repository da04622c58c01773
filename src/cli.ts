import path from 'node:path';
import { Command } from 'commander';
import { probeConnection } from './client/probe';
import { encodeObfuscated } from './auth/obfuscation';
import {
  createLedger,
  DEFAULT_BOOTSTRAP_CREDENTIAL,
  readLedgerFile,
  withBootstrapCredential,
  writeSampleAccessFile,
} from './auth/ledger';
import { loadLedgerFromDatabase } from './config/db';
import { createLogger, type ProjectLogger } from './config/logger';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config/options';
import { errorMessage } from './models/errors';
import type { Ledger } from './models/type';
import { BROKER_VERSION } from './server/broker';
import { MqttServer, serverOptionsFromConfig } from './server/server';

interface ServeFlags {
  config?: string;
  auth?: string;
  authMongo?: string;
  log2file?: string;
  disableAuth?: boolean;
  codedPwd?: boolean;
}

interface ProbeFlags {
  url: string;
  username?: string;
  password?: string;
  timeout: string;
}

async function loadLedger(flags: ServeFlags, log: ProjectLogger): Promise<Ledger | null> {
  if (flags.disableAuth) {
    return null;
  }
  let ledger = createLedger();
  if (flags.authMongo) {
    ledger = await loadLedgerFromDatabase(flags.authMongo);
    log.info('loaded users from database', { users: ledger.users.size });
  } else if (flags.auth) {
    ledger = await readLedgerFile(flags.auth, { passwordsObfuscated: flags.codedPwd, logger: log });
    log.info('loaded access file', { file: flags.auth, users: ledger.users.size });
  }
  if (!ledger.users.has(DEFAULT_BOOTSTRAP_CREDENTIAL.username)) {
    log.warn('adding the default admin account, define it in the access file to replace it', {
      user: DEFAULT_BOOTSTRAP_CREDENTIAL.username,
    });
  }
  return withBootstrapCredential(ledger, DEFAULT_BOOTSTRAP_CREDENTIAL);
}

async function serveCommand(flags: ServeFlags): Promise<void> {
  const log = createLogger({ file: flags.log2file });
  try {
    const config = await loadConfig(flags.config ?? DEFAULT_CONFIG_PATH);
    const ledger = await loadLedger(flags, log);
    const server = new MqttServer({
      ...serverOptionsFromConfig(config),
      logger: log,
      ledger,
      disableAuth: flags.disableAuth,
    });

    const shutdown = (signal: string) => {
      log.info('stopping', { signal });
      server.stop().catch((error: unknown) => log.error('stop failed', { error: errorMessage(error) }));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await server.run();
  } finally {
    await log.close();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mqtt-control')
    .description('MQTT broker with a file-based access ledger and an HTTP control plane')
    .version(BROKER_VERSION);

  program
    .command('serve', { isDefault: true })
    .description('Start the broker')
    .option('-c, --config <path>', 'config file path', DEFAULT_CONFIG_PATH)
    .option('-a, --auth <path>', 'access file path')
    .option('--auth-mongo <uri>', 'load users from a MongoDB users collection')
    .option('--log2file <path>', 'also write the log to this file')
    .option('--disable-auth', 'clients need no username and password, ignores --auth', false)
    .option('--coded-pwd', "passwords in the access file were written with 'code-password'", false)
    .action(serveCommand);

  program
    .command('initauth')
    .description('Write a sample access file')
    .option('-o, --output <path>', 'output path', 'auth.yaml')
    .action(async (opts: { output: string }) => {
      const out = path.resolve(opts.output);
      await writeSampleAccessFile(out);
      console.log(`Wrote sample access file to ${out}`);
    });

  program
    .command('code-password')
    .description('Obfuscate a password for the access file (not encryption)')
    .argument('<password>', 'password to obfuscate')
    .action((password: string) => {
      console.log(encodeObfuscated(password));
    });

  program
    .command('probe')
    .description('Try to connect to a broker with the given credentials')
    .option('--url <url>', 'broker url', 'mqtt://localhost:1883')
    .option('-u, --username <username>', 'username')
    .option('-p, --password <password>', 'password')
    .option('--timeout <ms>', 'connection timeout in milliseconds', '5000')
    .action(async (opts: ProbeFlags) => {
      const result = await probeConnection({
        url: opts.url,
        username: opts.username,
        password: opts.password,
        timeout: Number(opts.timeout),
      });
      if (result.connected) {
        console.log(`Connection successful (${result.elapsedMs}ms)`);
      } else {
        console.error(`Connection failed: ${result.error ?? 'unknown error'}`);
        process.exitCode = 1;
      }
    });

  return program;
}
