/**
 * Signing Keys - process-wide key material for the credential engine
 *
 * Loaded once at startup from two PEM blocks (PKCS#8 private, SPKI public).
 * A failure here is fatal: the process must not start without a usable pair.
 */

import { readFile } from 'fs/promises';
import { importPKCS8, importSPKI, jwtVerify, SignJWT, type KeyLike } from 'jose';
import { KeyLoadError } from '../utils/errors.js';

export const SIGNING_ALGORITHMS = ['RS256', 'ES256'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export interface SigningKeys {
  readonly algorithm: SigningAlgorithm;
  /** Used only to sign */
  readonly privateKey: KeyLike;
  /** Used only to verify */
  readonly publicKey: KeyLike;
}

export interface SigningKeyMaterial {
  privateKeyPem: string;
  publicKeyPem: string;
  algorithm?: SigningAlgorithm;
}

/**
 * Import a PEM key pair and prove the halves belong together by signing and
 * verifying a probe token.
 *
 * @throws {KeyLoadError} If either block cannot be parsed or they do not match
 */
export async function loadSigningKeys(material: SigningKeyMaterial): Promise<SigningKeys> {
  const algorithm = material.algorithm ?? 'RS256';

  let privateKey: KeyLike;
  try {
    privateKey = await importPKCS8(material.privateKeyPem, algorithm);
  } catch (error) {
    throw new KeyLoadError(`Failed to parse private key for ${algorithm}`, {
      originalError: error instanceof Error ? error.message : String(error),
    });
  }

  let publicKey: KeyLike;
  try {
    publicKey = await importSPKI(material.publicKeyPem, algorithm);
  } catch (error) {
    throw new KeyLoadError(`Failed to parse public key for ${algorithm}`, {
      originalError: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    const probe = await new SignJWT({ probe: true })
      .setProtectedHeader({ alg: algorithm })
      .sign(privateKey);
    await jwtVerify(probe, publicKey, { algorithms: [algorithm] });
  } catch (error) {
    throw new KeyLoadError('Private and public keys do not form a pair', {
      originalError: error instanceof Error ? error.message : String(error),
    });
  }

  console.log(`[SigningKeys] Loaded ${algorithm} key pair`);
  return Object.freeze({ algorithm, privateKey, publicKey });
}

/**
 * Read one PEM block from disk.
 *
 * @throws {KeyLoadError} If the file cannot be read
 */
export async function readKeyFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new KeyLoadError(`Failed to read key file ${path}`, {
      originalError: error instanceof Error ? error.message : String(error),
    });
  }
}
