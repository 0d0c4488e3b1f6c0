/**
 * =============================================================================
 * ADMISSION POLICY - Decide whether a resolved identity may connect
 * =============================================================================
 *
 * Stage two of the connection pipeline. Runs after the trust gate and is the
 * only place a handshake gets refused.
 *
 * POLICIES:
 * - strict: an active principal with a dispatch role is required
 * - viewer: as strict, but anonymous connections are let in as read-only
 *           viewers (echo only)
 * =============================================================================
 */

import { ErrorCode, UserRole } from '../../core/constants';
import { logger } from '../../shared/services/logger.service';
import { ResolvedIdentity, anonymous } from './trust-gate';

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; code: ErrorCode; message: string };

export interface AdmissionPolicy {
  readonly name: string;
  decide(identity: ResolvedIdentity): AdmissionDecision;
}

const DISPATCH_ROLES: readonly UserRole[] = [UserRole.DRIVER, UserRole.RIDER, UserRole.OWNER];

function decideForPrincipal(identity: Extract<ResolvedIdentity, { kind: 'principal' }>): AdmissionDecision {
  const { principal } = identity;

  if (!principal.isActive) {
    return { admitted: false, code: ErrorCode.PRINCIPAL_INACTIVE, message: 'Account is not active' };
  }

  if (!DISPATCH_ROLES.includes(principal.role)) {
    return { admitted: false, code: ErrorCode.ROLE_NOT_ALLOWED, message: 'Role cannot use dispatch' };
  }

  return { admitted: true };
}

export const strictAdmission: AdmissionPolicy = {
  name: 'strict',
  decide(identity) {
    if (identity.kind === 'anonymous') {
      return { admitted: false, code: ErrorCode.AUTH_REQUIRED, message: 'Authentication required' };
    }
    return decideForPrincipal(identity);
  }
};

export const viewerAdmission: AdmissionPolicy = {
  name: 'viewer',
  decide(identity) {
    if (identity.kind === 'anonymous') {
      return { admitted: true };
    }
    return decideForPrincipal(identity);
  }
};

export function getAdmissionPolicy(name: 'strict' | 'viewer'): AdmissionPolicy {
  return name === 'viewer' ? viewerAdmission : strictAdmission;
}

/**
 * socket.io middleware: refuses the handshake when the policy says no.
 * The client sees a connect_error whose message is the error code.
 */
export function createAdmissionMiddleware(policy: AdmissionPolicy) {
  return (
    socket: { id: string; data: { identity?: ResolvedIdentity } },
    next: (err?: Error) => void
  ): void => {
    const identity = socket.data.identity ?? anonymous('missing_token');
    const decision = policy.decide(identity);

    if (!decision.admitted) {
      logger.warn(`[Admission] Connection refused: ${socket.id}`, {
        policy: policy.name,
        code: decision.code,
        reason: identity.kind === 'anonymous' ? identity.reason : undefined
      });
      next(new Error(decision.code));
      return;
    }

    next();
  };
}
