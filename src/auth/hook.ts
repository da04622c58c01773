import { authenticate, decide } from './acl';
import { InitError } from '../models/errors';
import type { ClientIdentity, Credentials, Ledger, Operation } from '../models/type';

/**
 * Decides who may connect and what they may do once connected. The broker
 * consults exactly one hook.
 */
export interface BrokerHook {
  readonly id: string;
  onConnectAuthenticate(credentials: Credentials): Promise<boolean>;
  onAclCheck(client: ClientIdentity, topic: string, operation: Operation): boolean;
}

export class AuthHook implements BrokerHook {
  readonly id = 'auth-ledger';

  constructor(private readonly ledger: Ledger) {
    if (!(ledger.users instanceof Map)) {
      throw new InitError('auth hook needs a ledger with a user map');
    }
  }

  onConnectAuthenticate(credentials: Credentials): Promise<boolean> {
    return authenticate(this.ledger, credentials);
  }

  onAclCheck(client: ClientIdentity, topic: string, operation: Operation): boolean {
    return decide(this.ledger, client, topic, operation) === 'allow';
  }
}

// Used when authentication is switched off
export class AllowHook implements BrokerHook {
  readonly id = 'allow-all';

  onConnectAuthenticate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  onAclCheck(): boolean {
    return true;
  }
}
