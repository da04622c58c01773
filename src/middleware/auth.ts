import type { MiddlewareHandler } from 'hono';
import { basicAuth } from 'hono/basic-auth';
import { verifyPassword } from '../auth/acl';

export const REALM = 'mqtt-control';

/**
 * HTTP Basic-Auth against a fixed username → password snapshot. An empty
 * snapshot (authentication disabled) lets every request through.
 */
export function credentialAuth(credentials: ReadonlyMap<string, string>): MiddlewareHandler {
  if (credentials.size === 0) {
    return async (_c, next) => {
      await next();
    };
  }
  return basicAuth({
    realm: REALM,
    verifyUser: async (username, password) => {
      const stored = credentials.get(username);
      return stored !== undefined && verifyPassword(password, stored);
    },
  });
}
