/**
 * =============================================================================
 * TRUST GATE - Identity resolution for incoming connections
 * =============================================================================
 *
 * Stage one of the connection pipeline:
 *   token (query param) -> trust service -> storage -> Principal | anonymous
 *
 * This stage never rejects a handshake. Missing, malformed or expired tokens,
 * unknown or inactive principals and lookup failures all resolve to an
 * anonymous identity with a reason. Whether an anonymous connection may stay
 * is decided afterwards by the admission policy.
 * =============================================================================
 */

import { StorageService } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { Principal } from '../user/principal';
import { TrustService } from './token.service';

export type AnonymousReason =
  | 'missing_token'
  | 'invalid_token'
  | 'expired_token'
  | 'unknown_principal'
  | 'inactive_principal'
  | 'lookup_failed';

export type ResolvedIdentity =
  | { kind: 'principal'; principal: Principal }
  | { kind: 'anonymous'; reason: AnonymousReason };

export interface TrustGateDeps {
  trust: TrustService;
  storage: StorageService;
}

export const anonymous = (reason: AnonymousReason): ResolvedIdentity => ({ kind: 'anonymous', reason });

/**
 * Pull the token out of a parsed query string. Repeated keys use the first value.
 */
export function extractToken(query: Record<string, string | string[] | undefined>): string | undefined {
  const raw = query.token;
  const token = Array.isArray(raw) ? raw[0] : raw;
  return token && token.trim() !== '' ? token.trim() : undefined;
}

export async function resolveIdentity(
  token: string | undefined,
  deps: TrustGateDeps
): Promise<ResolvedIdentity> {
  if (!token) {
    return anonymous('missing_token');
  }

  let subjectId: string;
  try {
    const verification = await deps.trust.verify(token);
    if (!verification.ok) {
      return anonymous(verification.reason === 'expired' ? 'expired_token' : 'invalid_token');
    }
    subjectId = verification.subjectId;
  } catch (error) {
    logger.warn('[TrustGate] Token verification failed unexpectedly', {
      error: error instanceof Error ? error.message : String(error)
    });
    return anonymous('invalid_token');
  }

  let principal: Principal | null;
  try {
    principal = await deps.storage.getPrincipal(subjectId);
  } catch (error) {
    logger.error('[TrustGate] Principal lookup failed', {
      subjectId,
      error: error instanceof Error ? error.message : String(error)
    });
    return anonymous('lookup_failed');
  }

  if (!principal) {
    return anonymous('unknown_principal');
  }

  if (!principal.isActive) {
    return anonymous('inactive_principal');
  }

  return { kind: 'principal', principal };
}

/**
 * socket.io middleware: attaches the resolved identity and always continues.
 */
export function createTrustGateMiddleware(deps: TrustGateDeps) {
  return (
    socket: {
      handshake: { query: Record<string, string | string[] | undefined> };
      data: { identity?: ResolvedIdentity };
    },
    next: (err?: Error) => void
  ): void => {
    resolveIdentity(extractToken(socket.handshake.query), deps)
      .then((identity) => {
        socket.data.identity = identity;
        next();
      })
      .catch((error: unknown) => {
        // resolveIdentity handles its own failures; this is the last line
        logger.error('[TrustGate] Unexpected failure', {
          error: error instanceof Error ? error.message : String(error)
        });
        socket.data.identity = anonymous('lookup_failed');
        next();
      });
  };
}
