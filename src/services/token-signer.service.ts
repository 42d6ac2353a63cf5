import jwt from 'jsonwebtoken';
import { GHOST_API_VERSION, type Credential } from '../types/ghost.types.js';
import { fail, ok, type Result } from '../types/errors.types.js';
import type { InvalidCredentialFormatError, SigningError } from '../types/errors.types.js';

/**
 * Token Signer
 *
 * Mints the short-lived HS256 token the Ghost Admin API expects in
 * `Authorization: Ghost <token>`. A fresh token is signed for every request;
 * nothing is cached.
 *
 * Wire layout:
 * - header: { alg: "HS256", typ: "JWT", kid: <key id> }
 * - claims: { iat, exp: iat + 300, aud: "/v4/admin/" }
 * - key:    hex-decoded secret half of the admin key
 */

export const TOKEN_TTL_SECONDS = 300;
export const TOKEN_AUDIENCE = `/${GHOST_API_VERSION}/admin/`;

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

export type SignerError = InvalidCredentialFormatError | SigningError;

export interface AdminTokenClaims {
  iat: number;
  exp: number;
  aud: string;
}

/**
 * Splits an `ID:SECRET` admin key into its parts
 */
export function parseAdminApiKey(apiKey: string): Result<Credential, InvalidCredentialFormatError> {
  const parts = apiKey.split(':');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return fail({
      kind: 'InvalidCredentialFormat',
      message: "Invalid API key format. Expected 'ID:SECRET'",
    });
  }

  return ok({ keyId: parts[0], secret: parts[1] });
}

/**
 * Hex decodes the secret. Buffer.from silently stops at the first bad
 * character, so the input is checked first.
 */
function decodeSecret(secret: string): Result<Buffer, SigningError> {
  if (!HEX_PATTERN.test(secret) || secret.length % 2 !== 0) {
    return fail({
      kind: 'SigningError',
      message: 'Failed to generate JWT token: secret is not a valid hex string',
    });
  }
  return ok(Buffer.from(secret, 'hex'));
}

export function buildAdminTokenClaims(nowMs: number): AdminTokenClaims {
  const iat = Math.floor(nowMs / 1000);
  return {
    iat,
    exp: iat + TOKEN_TTL_SECONDS,
    aud: TOKEN_AUDIENCE,
  };
}

/**
 * Signs an admin API token for the given key at the given time
 */
export function signAdminToken(apiKey: string, nowMs: number = Date.now()): Result<string, SignerError> {
  const credential = parseAdminApiKey(apiKey);
  if (!credential.success) {
    return credential;
  }

  const key = decodeSecret(credential.data.secret);
  if (!key.success) {
    return key;
  }

  try {
    const token = jwt.sign(buildAdminTokenClaims(nowMs), key.data, {
      algorithm: 'HS256',
      keyid: credential.data.keyId,
    });
    return ok(token);
  } catch (error) {
    return fail({
      kind: 'SigningError',
      message: `Failed to generate JWT token: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}
