/**
 * =============================================================================
 * TRUST SERVICE - Credential token verification
 * =============================================================================
 *
 * Verifies access tokens and yields the subject (principal id) they were
 * issued for. Verification never throws: failures come back as a reason.
 *
 * Tokens are HS256 JWTs carrying { userId, role, phone }.
 * =============================================================================
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UserRole } from '../../core/constants';
import { Principal } from '../user/principal';

export type TokenVerification =
  | { ok: true; subjectId: string }
  | { ok: false; reason: 'expired' | 'invalid' };

export interface TrustService {
  verify(token: string): Promise<TokenVerification>;
}

const accessClaimsSchema = z.object({
  userId: z.string().min(1),
  role: z.nativeEnum(UserRole).optional(),
  phone: z.string().optional()
});

export type AccessClaims = z.infer<typeof accessClaimsSchema>;

export interface JwtTrustServiceOptions {
  secret: string;
  expiresIn: string;
}

export class JwtTrustService implements TrustService {
  constructor(private readonly options: JwtTrustServiceOptions) { }

  async verify(token: string): Promise<TokenVerification> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, { algorithms: ['HS256'] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return { ok: false, reason: 'expired' };
      }
      return { ok: false, reason: 'invalid' };
    }

    const claims = accessClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      return { ok: false, reason: 'invalid' };
    }

    return { ok: true, subjectId: claims.data.userId };
  }

  /**
   * Issue an access token for a principal (development tooling and tests)
   */
  issueAccessToken(principal: Principal, expiresIn: string = this.options.expiresIn): string {
    const claims: AccessClaims = {
      userId: principal.id,
      role: principal.role,
      phone: principal.phoneNumber
    };

    return jwt.sign(claims, this.options.secret, {
      algorithm: 'HS256',
      expiresIn
    } as jwt.SignOptions);
  }
}
