import { MongoClient, Db } from 'mongodb';
import { z } from 'zod';
import { createLedger } from '../auth/ledger';
import { ConfigError } from '../models/errors';
import { PermissionLevel, type AccessRule, type Ledger, type StoredUser, type UserRecord } from '../models/type';

const DB_NAME = 'mqtt_auth';
const USERS = 'users';

const LevelSchema = z.nativeEnum(PermissionLevel);

export async function connectDB(uri: string, name: string = DB_NAME): Promise<{ client: MongoClient; db: Db }> {
  const client = await MongoClient.connect(uri);
  return { client, db: client.db(name) };
}

function toUserRecord(user: StoredUser): UserRecord {
  const rules: AccessRule[] = (user.acls ?? []).map((acl) => {
    const level = LevelSchema.safeParse(acl.acc);
    if (!level.success) {
      throw new ConfigError(`user "${user.username}": acl "${acl.topic}" has invalid access level ${acl.acc}`);
    }
    return { filter: acl.topic, level: level.data };
  });
  if (user.superuser) {
    rules.push({ filter: '#', level: PermissionLevel.ReadWrite });
  }
  return { username: user.username, password: user.password, rules, disallowed: false };
}

/** Superusers get a trailing `#` read/write rule after their own ACLs. */
export function ledgerFromStoredUsers(users: readonly StoredUser[]): Ledger {
  return createLedger({ users: users.map(toUserRecord) });
}

export async function loadUsers(db: Db): Promise<StoredUser[]> {
  return db.collection<StoredUser>(USERS).find({}, { projection: { _id: 0 } }).toArray();
}

export async function loadLedgerFromDatabase(uri: string, name: string = DB_NAME): Promise<Ledger> {
  const { client, db } = await connectDB(uri, name);
  try {
    return ledgerFromStoredUsers(await loadUsers(db));
  } finally {
    await client.close();
  }
}
