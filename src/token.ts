/**
 * @module token
 *
 * Access token checks. Tokens are JWT-shaped (`prefix.payload.signature`)
 * and carry the owning account name in the `u` claim.
 */

import { InvalidTokenError, jwtDecode } from 'jwt-decode';
import { TilesetsError } from './errors.js';

interface TokenPayload {
  u?: unknown;
}

/**
 * Check that `token` belongs to `username`.
 *
 * @throws {TilesetsError} If the token has no decodable payload, no `u`
 *   claim, or a `u` claim naming another account.
 */
export function validateToken(username: string, token: string): void {
  let payload: TokenPayload;
  try {
    payload = jwtDecode<TokenPayload>(token);
  } catch (err) {
    if (err instanceof InvalidTokenError) {
      throw new TilesetsError('Token does not contain a payload component', { cause: err });
    }
    throw err;
  }

  if (typeof payload.u !== 'string') {
    throw new TilesetsError('Token does not contain a username');
  }
  if (payload.u !== username) {
    throw new TilesetsError(`Token username ${payload.u} does not match username ${username}`);
  }
}
