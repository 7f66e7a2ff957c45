/**
 * Authentication Utilities - Duty Rota Service
 *
 * Extracts the caller from API Gateway events and resolves their rota role
 * once, at the boundary. Services receive the resolved role explicitly.
 */

import { APIGatewayProxyEvent } from 'aws-lambda';
import { Logger } from './logger';
import { PersonModel } from '../models/person';
import { NotAuthorizedError } from './scheduling/errors';
import type { Person, RotaDomain } from '../types/entities';

/**
 * User context extracted from the JWT or mocked for local development
 */
export interface UserContext {
  userId: string;
  email: string;
  name: string;
  role?: string;
}

export interface AdminRole {
  kind: 'admin';
  userId: string;
}

export interface MemberRole {
  kind: RotaDomain;
  userId: string;
  personId: string;
  personName: string;
}

/**
 * Who the caller is, as far as the rota is concerned
 */
export type PersonRole = AdminRole | MemberRole;

/**
 * Decode JWT payload (without verification - already verified by Cognito)
 */
const decodeJWT = (token: string): Record<string, unknown> => {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw new NotAuthorizedError('Invalid JWT token');
  }

  const payload = parts[1];
  if (!payload) {
    throw new NotAuthorizedError('Invalid JWT payload');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, 'base64').toString('utf8'));
  } catch {
    throw new NotAuthorizedError('Invalid JWT payload');
  }
  if (typeof decoded !== 'object' || decoded === null) {
    throw new NotAuthorizedError('Invalid JWT payload');
  }
  return { ...decoded };
};

const claimString = (claims: Record<string, unknown>, key: string): string | undefined => {
  const value = claims[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * Get authenticated user context from API Gateway event
 *
 * In production: decodes the Cognito JWT from the Authorization header.
 * In local development (AWS_SAM_LOCAL=true): returns a mock admin.
 *
 * @throws NotAuthorizedError if authentication is missing
 */
export const getUserContext = (event: APIGatewayProxyEvent, logger?: Logger): UserContext => {
  if (process.env['AWS_SAM_LOCAL'] === 'true') {
    logger?.warn('Using mock authentication for local development');
    return {
      userId: 'mock-user-id',
      email: 'admin@example.com',
      name: 'Test Admin',
      role: 'admin',
    };
  }

  const authHeader = event.headers?.['Authorization'] || event.headers?.['authorization'];
  const token = authHeader?.replace(/^Bearer\s+/i, '');
  if (!token) {
    throw new NotAuthorizedError('Authentication required');
  }

  const claims = decodeJWT(token);
  const userId = claimString(claims, 'sub') ?? claimString(claims, 'cognito:username');
  if (!userId) {
    throw new NotAuthorizedError('Authentication required');
  }

  const email = claimString(claims, 'email') ?? '';
  const role = claimString(claims, 'custom:role');

  return {
    userId,
    email,
    name: claimString(claims, 'name') || email.split('@')[0] || 'User',
    ...(role && { role }),
  };
};

/**
 * Pick the rota role for a login.
 * Admin claims win; a login linked to both pools counts as a technician.
 */
export const pickPersonRole = (user: UserContext, linked: readonly Person[]): PersonRole | null => {
  if (user.role === 'admin') {
    return { kind: 'admin', userId: user.userId };
  }

  const technician = linked.find((person) => person.domain === 'technician');
  const collaborator = linked.find((person) => person.domain === 'collaborator');
  const person = technician ?? collaborator;

  return person
    ? { kind: person.domain, userId: user.userId, personId: person.personId, personName: person.fullName }
    : null;
};

/**
 * Resolve the caller's rota role from their linked person records
 *
 * @throws NotAuthorizedError if the login is neither admin nor linked to a pool
 */
export const resolvePersonRole = async (user: UserContext): Promise<PersonRole> => {
  const linked = user.role === 'admin' ? [] : await PersonModel.listByUserId(user.userId);
  const role = pickPersonRole(user, linked);

  if (!role) {
    throw new NotAuthorizedError('User is not linked to a rota member');
  }
  return role;
};

export const isAdmin = (role: PersonRole): role is AdminRole => role.kind === 'admin';

/**
 * @throws NotAuthorizedError unless the role is admin
 */
export function requireAdmin(role: PersonRole): asserts role is AdminRole {
  if (!isAdmin(role)) {
    throw new NotAuthorizedError('Admin role required for this operation');
  }
}

/**
 * Authenticate the request and resolve the caller's rota role
 */
export const getPersonRole = async (event: APIGatewayProxyEvent, logger?: Logger): Promise<PersonRole> =>
  resolvePersonRole(getUserContext(event, logger));
