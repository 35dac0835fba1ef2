/**
 * Versioned user endpoints.
 *
 * v1.0 returns a flat `name` field and is deprecated in favour of v2.0,
 * which splits the name, wraps lists in a `data` envelope with paging
 * metadata and accepts new users.
 */

import { deny, type VersionedHandler } from '@versionkit/http';
import type { RouteTableBuilder } from '@versionkit/core';
import { z } from 'zod';
import { DuplicateEmailError, type UserRecord, type UserRepository } from '../modules/users/index.js';

export const USERS_V1_SUNSET = '2027-01-01T00:00:00.000Z';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0)
});

const createUserSchema = z.object({
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  email: z.string().trim().email()
});

function toV1(user: UserRecord) {
  return {
    id: user.id,
    name: `${user.firstName} ${user.lastName}`,
    email: user.email
  };
}

function toV2(user: UserRecord) {
  return {
    id: user.id,
    firstName: user.firstName,
    lastName: user.lastName,
    email: user.email,
    createdAt: user.createdAt.toISOString()
  };
}

function validationMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid request.';
}

export function registerUserRoutes(routes: RouteTableBuilder<VersionedHandler>, repository: UserRepository): void {
  const listV1: VersionedHandler = async () => {
    const page = await repository.list({ limit: 100, offset: 0 });
    return page.items.map(toV1);
  };

  const showV1: VersionedHandler = async (request, reply, context) => {
    const user = await repository.findById(context.params.id ?? '');
    if (!user) {
      return deny({ request, reply, status: 404, code: 'USER_NOT_FOUND', message: 'User not found.' });
    }
    return toV1(user);
  };

  const listV2: VersionedHandler = async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return deny({ request, reply, code: 'VALIDATION_ERROR', message: validationMessage(query.error) });
    }

    const page = await repository.list(query.data);
    return {
      data: page.items.map(toV2),
      pagination: { limit: query.data.limit, offset: query.data.offset, total: page.total }
    };
  };

  const showV2: VersionedHandler = async (request, reply, context) => {
    const user = await repository.findById(context.params.id ?? '');
    if (!user) {
      return deny({ request, reply, status: 404, code: 'USER_NOT_FOUND', message: 'User not found.' });
    }
    return { data: toV2(user) };
  };

  const createV2: VersionedHandler = async (request, reply) => {
    const body = createUserSchema.safeParse(request.body);
    if (!body.success) {
      return deny({ request, reply, code: 'VALIDATION_ERROR', message: validationMessage(body.error) });
    }

    try {
      const user = await repository.create(body.data);
      return reply.status(201).send({ data: toV2(user) });
    } catch (error) {
      if (error instanceof DuplicateEmailError) {
        return deny({ request, reply, status: 409, code: error.code, message: error.message });
      }
      throw error;
    }
  };

  const v1Deprecation = {
    sunsetDate: USERS_V1_SUNSET,
    replacement: '/v2/users',
    reason: 'v1 returns a single name field.',
    migrationGuide: 'https://docs.example.com/accounts/migrate-to-v2'
  };

  routes.endpoint('GET', '/users').version('1.0').handler(listV1).deprecated(v1Deprecation);
  routes.endpoint('GET', '/users/:id').version('1.0').handler(showV1).deprecated(v1Deprecation);

  routes.add('GET', '/users', '2.0', listV2);
  routes.add('GET', '/users/:id', '2.0', showV2);
  routes.add('POST', '/users', '2.0', createV2);
}
