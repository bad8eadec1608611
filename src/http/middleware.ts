/**
 * Bearer authentication for protected routes
 *
 * Verifies the access credential from `Authorization: Bearer <token>` and
 * stores the bound account id on `res.locals`.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AccountId } from '../core/types.js';
import { isCredentialFailure, InvalidTokenError } from '../utils/errors.js';

export const AUTH_REALM = 'credential-lifecycle';

export interface AccessTokenAuthenticator {
  authenticateAccessToken(accessToken: string): Promise<AccountId>;
}

export function extractBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) {
    return null;
  }
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : null;
}

export function requireAccessToken(authenticator: AccessTokenAuthenticator): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = extractBearerToken(req);

    if (!token) {
      res.setHeader('WWW-Authenticate', `Bearer realm="${AUTH_REALM}"`);
      res.status(401).json({
        error: 'unauthorized',
        error_description: 'Missing Authorization header with Bearer token',
      });
      return;
    }

    authenticator.authenticateAccessToken(token).then(
      (accountId) => {
        res.locals.accountId = accountId;
        next();
      },
      (error: unknown) => {
        if (!isCredentialFailure(error)) {
          next(error);
          return;
        }
        res.setHeader('WWW-Authenticate', `Bearer realm="${AUTH_REALM}", error="invalid_token"`);
        res.status(401).json({
          error: 'invalid_token',
          error_description: 'Access token is invalid or expired',
        });
      }
    );
  };
}

/**
 * Account id stored by {@link requireAccessToken}.
 *
 * @throws {InvalidTokenError} If the middleware did not run for this request
 */
export function getAuthenticatedAccountId(res: Response): AccountId {
  const accountId: unknown = res.locals.accountId;
  if (typeof accountId !== 'number') {
    throw new InvalidTokenError('Request is not authenticated');
  }
  return accountId;
}
