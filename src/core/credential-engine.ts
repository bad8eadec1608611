/**
 * Credential Engine - issues and verifies access and refresh credentials
 *
 * Credentials are JWS compact tokens carrying iss/sub/iat/exp/user_id.
 * The credential class lives in the `sub` claim, so a single jwtVerify call
 * checks signature and class together: turning an access credential into a
 * refresh credential means forging a signature.
 *
 * NOT responsible for:
 * - Account lookups (SessionOrchestrator)
 * - Deciding who may receive a credential (AccountStateMachine)
 */

import { decodeJwt, errors, jwtVerify, SignJWT } from 'jose';
import { z } from 'zod';
import type { AccountId, Clock, CredentialClaims, CredentialClass } from './types.js';
import { systemClock } from './types.js';
import type { SigningKeys } from './signing-keys.js';
import {
  ExpiredTokenError,
  InvalidTokenError,
  MalformedClaimError,
  SigningError,
} from '../utils/errors.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_ISSUER = 'credential-lifecycle';

export const CREDENTIAL_SUBJECTS: Record<CredentialClass, string> = {
  access: 'access-token',
  refresh: 'refresh-token',
};

/** 30 minutes */
export const DEFAULT_ACCESS_TTL_SECONDS = 30 * 60;

/** 72 hours */
export const DEFAULT_REFRESH_TTL_SECONDS = 72 * 60 * 60;

const UserIdClaimSchema = z.number().int().nonnegative().safe();

const CredentialClaimsSchema = z.object({
  iss: z.string(),
  sub: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
  user_id: UserIdClaimSchema,
});

// ============================================================================
// Capabilities
// ============================================================================

export interface CredentialIssuer {
  issue(accountId: AccountId, credentialClass: CredentialClass): Promise<string>;
}

export interface CredentialVerifier {
  /**
   * @returns The account id bound to the credential
   * @throws {InvalidTokenError} Bad signature, format, issuer or class
   * @throws {ExpiredTokenError} `exp` has passed
   * @throws {MalformedClaimError} `user_id` missing or not a non-negative integer
   */
  verify(token: string, credentialClass: CredentialClass): Promise<AccountId>;
}

export interface CredentialEngineOptions {
  issuer?: string;
  accessTtlSeconds?: number;
  refreshTtlSeconds?: number;
  clock?: Clock;
}

// ============================================================================
// Credential Engine
// ============================================================================

export class CredentialEngine implements CredentialIssuer, CredentialVerifier {
  private readonly keys: SigningKeys;
  private readonly issuer: string;
  private readonly ttlSeconds: Record<CredentialClass, number>;
  private readonly clock: Clock;

  constructor(keys: SigningKeys, options: CredentialEngineOptions = {}) {
    this.keys = keys;
    this.issuer = options.issuer ?? DEFAULT_ISSUER;
    this.ttlSeconds = {
      access: options.accessTtlSeconds ?? DEFAULT_ACCESS_TTL_SECONDS,
      refresh: options.refreshTtlSeconds ?? DEFAULT_REFRESH_TTL_SECONDS,
    };
    this.clock = options.clock ?? systemClock;
  }

  getTtlSeconds(credentialClass: CredentialClass): number {
    return this.ttlSeconds[credentialClass];
  }

  async issue(accountId: AccountId, credentialClass: CredentialClass): Promise<string> {
    if (!UserIdClaimSchema.safeParse(accountId).success) {
      throw new SigningError(`Cannot bind credential to account id ${accountId}`);
    }

    const issuedAt = Math.floor(this.clock.now().getTime() / 1000);

    try {
      return await new SignJWT({ user_id: accountId })
        .setProtectedHeader({ alg: this.keys.algorithm, typ: 'JWT' })
        .setIssuer(this.issuer)
        .setSubject(CREDENTIAL_SUBJECTS[credentialClass])
        .setIssuedAt(issuedAt)
        .setExpirationTime(issuedAt + this.ttlSeconds[credentialClass])
        .sign(this.keys.privateKey);
    } catch (error) {
      throw new SigningError('Failed to sign credential', {
        credentialClass,
        originalError: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async verify(token: string, credentialClass: CredentialClass): Promise<AccountId> {
    let payload: Record<string, unknown>;
    try {
      ({ payload } = await jwtVerify(token, this.keys.publicKey, {
        algorithms: [this.keys.algorithm],
        issuer: this.issuer,
        subject: CREDENTIAL_SUBJECTS[credentialClass],
        requiredClaims: ['iat', 'exp'],
        clockTolerance: 0,
        currentDate: this.clock.now(),
      }));
    } catch (error) {
      // JWTExpired extends JWTClaimValidationFailed: check it first
      if (error instanceof errors.JWTExpired) {
        throw new ExpiredTokenError('Credential has expired', { credentialClass });
      }
      if (error instanceof errors.JOSEError) {
        throw new InvalidTokenError('Credential verification failed', {
          credentialClass,
          reason: error.code,
        });
      }
      throw new InvalidTokenError('Credential verification failed', {
        credentialClass,
        originalError: error instanceof Error ? error.message : String(error),
      });
    }

    const userId = UserIdClaimSchema.safeParse(payload.user_id);
    if (!userId.success) {
      throw new MalformedClaimError('Credential user_id claim is missing or not an integer', {
        credentialClass,
      });
    }
    return userId.data;
  }

  /**
   * Read the claim set WITHOUT verifying the signature.
   *
   * For diagnostics only; never authorize on the result.
   */
  decode(token: string): CredentialClaims {
    let payload: unknown;
    try {
      payload = decodeJwt(token);
    } catch (error) {
      throw new InvalidTokenError('Credential cannot be decoded', {
        originalError: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = CredentialClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedClaimError('Credential claim set has an unexpected shape', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    return parsed.data;
  }
}
