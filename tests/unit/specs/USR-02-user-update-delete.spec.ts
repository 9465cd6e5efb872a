/**
 * USR-02: User Update and Soft Delete
 *
 * PUT /users/{id} changes only the fields sent; DELETE /users/{id} flags
 * the record and frees its email.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorMessages, InMemoryUserDirectory } from '@account-service/shared';
import type { HttpHandler, SecretHasher } from '@account-service/shared';
import { createUsersHandler } from '../../../modules/governance/users/src';
import { captureConsole } from '../support/console';
import type { ConsoleCapture } from '../support/console';
import { createTestHasher } from '../support/directory';
import { T0_MS } from '../support/issuer';
import { buildContext, buildEvent, header, jsonBody, structured } from '../support/lambda';

const CREATED_AT = '2025-01-01T00:00:00.000Z';
const LATER = '2025-01-01T01:00:00.000Z';

function putUser(id: string, body: unknown) {
  return buildEvent({ method: 'PUT', path: `/users/${id}`, pathParameters: { id }, body });
}

function deleteUser(id: string) {
  return buildEvent({ method: 'DELETE', path: `/users/${id}`, pathParameters: { id } });
}

describe('USR-02: User Update and Soft Delete', () => {
  let logs: ConsoleCapture;
  let now: number;
  let directory: InMemoryUserDirectory;
  let hasher: SecretHasher;
  let handler: HttpHandler;

  beforeEach(async () => {
    logs = captureConsole();
    now = T0_MS;
    directory = new InMemoryUserDirectory({ clock: () => new Date(now) });
    hasher = createTestHasher();
    handler = createUsersHandler(() => ({ directory, hasher }));

    for (const [firstName, lastName, email] of [
      ['Ada', 'Lovelace', 'ada@example.com'],
      ['Alan', 'Turing', 'alan@example.com'],
    ]) {
      const created = await directory.create({
        firstName,
        lastName,
        email,
        passwordHash: await hasher.hash('old-password'),
      });
      if (!created.ok) {
        throw new Error(`seed failed: ${created.error.kind}`);
      }
    }
    now = T0_MS + 60 * 60_000;
  });

  afterEach(() => {
    logs.spy.mockRestore();
  });

  describe('PUT /users/{id}', () => {
    it('should change only the fields sent', async () => {
      const result = await handler(putUser('1', { first_name: 'Augusta' }), buildContext());

      expect(structured(result).statusCode).toBe(200);
      expect(jsonBody(result)).toEqual({
        user_id: '1',
        first_name: 'Augusta',
        last_name: 'Lovelace',
        email: 'ada@example.com',
        is_deleted: false,
        deleted_at: null,
        created_at: CREATED_AT,
        updated_at: LATER,
      });
    });

    it('should clear the last name when sent as null', async () => {
      const result = await handler(putUser('1', { last_name: null }), buildContext());

      expect(jsonBody(result)).toMatchObject({ last_name: null });
    });

    it('should rehash a new password', async () => {
      await handler(putUser('1', { password: 'new-password' }), buildContext());

      const stored = await directory.findById('1');
      if (!stored.ok || !stored.value) {
        throw new Error('user 1 missing');
      }
      expect(await hasher.verify('new-password', stored.value.passwordHash)).toBe(true);
      expect(await hasher.verify('old-password', stored.value.passwordHash)).toBe(false);
    });

    it('should audit the names of the updated fields', async () => {
      await handler(putUser('1', { email: 'augusta@example.com', password: 'new-password' }), buildContext());

      const [event] = logs.audits('USER_UPDATED');
      expect(event.details).toEqual({ userId: '1', updatedFields: ['email', 'password'] });
    });

    it('should reject an email held by another active user', async () => {
      const result = await handler(putUser('1', { email: 'alan@example.com' }), buildContext());

      expect(structured(result).statusCode).toBe(409);
      expect(jsonBody(result)).toEqual({ error: 'conflict', error_description: ErrorMessages.EMAIL_EXISTS });
    });

    it('should accept an email that differs from another user\'s only in case', async () => {
      const result = await handler(putUser('1', { email: 'Alan@Example.com' }), buildContext());

      expect(structured(result).statusCode).toBe(200);
      expect(jsonBody(result)).toMatchObject({ user_id: '1', email: 'Alan@Example.com' });
    });

    it('should allow re-sending the user\'s own email', async () => {
      const result = await handler(putUser('1', { email: 'ada@example.com' }), buildContext());

      expect(structured(result).statusCode).toBe(200);
    });

    it('should refuse to update a deleted user', async () => {
      await handler(deleteUser('1'), buildContext());

      const result = await handler(putUser('1', { first_name: 'Augusta' }), buildContext());

      expect(structured(result).statusCode).toBe(400);
      expect(jsonBody(result)).toEqual({ error: 'invalid_request', error_description: ErrorMessages.USER_DELETED_UPDATE });
    });

    it('should answer 404 for an unknown id', async () => {
      const result = await handler(putUser('99', { first_name: 'Nobody' }), buildContext());

      expect(structured(result).statusCode).toBe(404);
    });

    it('should validate the fields that are present', async () => {
      const result = await handler(putUser('1', { email: 'not-an-email' }), buildContext());

      expect(structured(result).statusCode).toBe(400);
      expect(jsonBody(result)).toEqual({
        error: 'invalid_request',
        error_description: 'email must be a valid email address',
      });
    });
  });

  describe('DELETE /users/{id}', () => {
    it('should soft-delete and keep the record readable', async () => {
      const result = await handler(deleteUser('1'), buildContext());

      expect(structured(result).statusCode).toBe(204);
      expect(structured(result).body).toBe('');

      const read = await handler(
        buildEvent({ method: 'GET', path: '/users/1', pathParameters: { id: '1' } }),
        buildContext()
      );
      expect(jsonBody(read)).toMatchObject({ user_id: '1', is_deleted: true, deleted_at: LATER, updated_at: LATER });
    });

    it('should free the email for a new registration', async () => {
      await handler(deleteUser('1'), buildContext());

      const result = await handler(
        buildEvent({
          method: 'POST',
          path: '/users',
          body: { first_name: 'Ada', email: 'ada@example.com', password: 'correct-password' },
        }),
        buildContext()
      );

      expect(structured(result).statusCode).toBe(201);
      expect(jsonBody(result)).toMatchObject({ user_id: '3' });
    });

    it('should answer 400 when the user is already deleted', async () => {
      await handler(deleteUser('1'), buildContext());

      const result = await handler(deleteUser('1'), buildContext());

      expect(structured(result).statusCode).toBe(400);
      expect(jsonBody(result)).toEqual({ error: 'invalid_request', error_description: ErrorMessages.USER_ALREADY_DELETED });
    });

    it('should answer 404 for an unknown id', async () => {
      const result = await handler(deleteUser('99'), buildContext());

      expect(structured(result).statusCode).toBe(404);
      expect(jsonBody(result)).toEqual({ error: 'not_found', error_description: ErrorMessages.USER_NOT_FOUND });
    });

    it('should audit the deletion', async () => {
      await handler(deleteUser('2'), buildContext());

      const [event] = logs.audits('USER_DELETED');
      expect(event.details).toEqual({ userId: '2' });
    });
  });

  it('should reject unsupported item methods', async () => {
    const result = await handler(
      buildEvent({ method: 'PATCH', path: '/users/1', pathParameters: { id: '1' }, body: {} }),
      buildContext()
    );

    expect(structured(result).statusCode).toBe(405);
    expect(header(result, 'Allow')).toBe('GET, PUT, DELETE');
  });
});
