/**
 * =============================================================================
 * PRINCIPAL - Resolved identity attached to a connection
 * =============================================================================
 *
 * One record type tagged with a role. Role-specific defaults (staff access,
 * role tag) are applied by the factory functions at construction time.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { REGEX, UserRole, ValidationError } from '../../core';

export interface Principal {
  id: string;
  phoneNumber: string;
  firstName: string | null;
  lastName: string | null;
  role: UserRole;
  isActive: boolean;
  isStaff: boolean;
  dateJoined: string;
}

/**
 * Shape nested into trip views for the rider and driver
 */
export interface PrincipalSummary {
  id: string;
  phoneNumber: string;
  firstName: string | null;
  lastName: string | null;
  role: UserRole;
}

export const principalInputSchema = z.object({
  id: z.string().min(1).optional(),
  phoneNumber: z.string().regex(REGEX.PHONE, 'Phone number must be 10 digits'),
  firstName: z.string().max(50).nullable().optional(),
  lastName: z.string().max(50).nullable().optional(),
  isActive: z.boolean().optional(),
  dateJoined: z.string().datetime().optional()
});

export type PrincipalInput = z.input<typeof principalInputSchema>;

export const principalSchema = z.object({
  id: z.string().min(1),
  phoneNumber: z.string(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  role: z.nativeEnum(UserRole),
  isActive: z.boolean(),
  isStaff: z.boolean(),
  dateJoined: z.string()
});

function buildPrincipal(role: UserRole, input: PrincipalInput, isStaff: boolean): Principal {
  const parsed = principalInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, 'Invalid principal');
  }
  const data = parsed.data;

  return {
    id: data.id ?? uuidv4(),
    phoneNumber: data.phoneNumber,
    firstName: data.firstName ?? null,
    lastName: data.lastName ?? null,
    role,
    // Accounts start inactive until verified
    isActive: data.isActive ?? false,
    isStaff,
    dateJoined: data.dateJoined ?? new Date().toISOString()
  };
}

export function createRider(input: PrincipalInput): Principal {
  return buildPrincipal(UserRole.RIDER, input, false);
}

export function createDriver(input: PrincipalInput): Principal {
  return buildPrincipal(UserRole.DRIVER, input, false);
}

/**
 * Owners manage the fleet and get staff access.
 */
export function createOwner(input: PrincipalInput): Principal {
  return buildPrincipal(UserRole.OWNER, input, true);
}

const FACTORIES: Record<UserRole, (input: PrincipalInput) => Principal> = {
  [UserRole.RIDER]: createRider,
  [UserRole.DRIVER]: createDriver,
  [UserRole.OWNER]: createOwner
};

export function createPrincipal(role: UserRole, input: PrincipalInput): Principal {
  return FACTORIES[role](input);
}

export function toPrincipalSummary(principal: Principal): PrincipalSummary {
  return {
    id: principal.id,
    phoneNumber: principal.phoneNumber,
    firstName: principal.firstName,
    lastName: principal.lastName,
    role: principal.role
  };
}

export function isStaff(principal: Principal): boolean {
  return principal.isStaff && principal.role === UserRole.OWNER;
}
