/**
 * HND-03: Current User Endpoint
 *
 * GET /auth/me answers the claims of a valid bearer token and a 401
 * challenge for anything else.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorMessages, TokenCodec } from '@account-service/shared';
import type { HttpHandler } from '@account-service/shared';
import { createMeHandler } from '../../../modules/protocols/userinfo/src';
import { captureConsole } from '../support/console';
import type { ConsoleCapture } from '../support/console';
import { T0_MS, createTestCodec } from '../support/issuer';
import { buildContext, buildEvent, header, jsonBody, structured } from '../support/lambda';

const T0_SECONDS = T0_MS / 1000;

function meEvent(authorization?: string, method = 'GET') {
  return buildEvent({
    method,
    path: '/auth/me',
    headers: authorization === undefined ? {} : { authorization },
  });
}

describe('HND-03: Current User Endpoint', () => {
  let logs: ConsoleCapture;
  let now: number;
  let codec: TokenCodec;
  let handler: HttpHandler;
  let token: string;

  beforeEach(async () => {
    logs = captureConsole();
    now = T0_MS;
    codec = createTestCodec(() => now);
    handler = createMeHandler(() => codec);
    token = await codec.issue({ sub: '1', email: 'ada@example.com', first_name: 'Ada', last_name: 'Lovelace' });
  });

  afterEach(() => {
    logs.spy.mockRestore();
  });

  function expectChallenge(result: Awaited<ReturnType<HttpHandler>>, description: string) {
    expect(structured(result).statusCode).toBe(401);
    expect(header(result, 'WWW-Authenticate')).toBe('Bearer error="invalid_token"');
    expect(jsonBody(result)).toEqual({ error: 'invalid_token', error_description: description });
  }

  it('should return the token claims', async () => {
    const result = await handler(meEvent(`Bearer ${token}`), buildContext());

    expect(structured(result).statusCode).toBe(200);
    expect(jsonBody(result)).toEqual({
      sub: '1',
      email: 'ada@example.com',
      first_name: 'Ada',
      last_name: 'Lovelace',
      iat: T0_SECONDS,
      exp: T0_SECONDS + 1800,
    });
  });

  it('should accept the scheme in any case', async () => {
    const result = await handler(meEvent(`bearer ${token}`), buildContext());

    expect(structured(result).statusCode).toBe(200);
  });

  it('should challenge a request without a token', async () => {
    expectChallenge(await handler(meEvent(), buildContext()), ErrorMessages.MISSING_TOKEN);
  });

  it('should treat a non-Bearer scheme as missing', async () => {
    expectChallenge(await handler(meEvent('Basic dGVzdDp0ZXN0'), buildContext()), ErrorMessages.MISSING_TOKEN);
  });

  it('should challenge an expired token', async () => {
    now = T0_MS + 31 * 60_000;

    expectChallenge(await handler(meEvent(`Bearer ${token}`), buildContext()), ErrorMessages.INVALID_TOKEN);
  });

  it('should challenge a token signed with another secret', async () => {
    const other = new TokenCodec({ secret: 'other-test-secret', algorithm: 'HS256', ttlSeconds: 1800, now: () => now });
    const forged = await other.issue({ sub: '1', email: 'ada@example.com' });

    expectChallenge(await handler(meEvent(`Bearer ${forged}`), buildContext()), ErrorMessages.INVALID_TOKEN);
  });

  it('should challenge a malformed token', async () => {
    expectChallenge(await handler(meEvent('Bearer not-a-token'), buildContext()), ErrorMessages.INVALID_TOKEN);
  });

  it('should reject other methods', async () => {
    const result = await handler(meEvent(`Bearer ${token}`, 'POST'), buildContext());

    expect(structured(result).statusCode).toBe(405);
    expect(header(result, 'Allow')).toBe('GET');
  });
});
