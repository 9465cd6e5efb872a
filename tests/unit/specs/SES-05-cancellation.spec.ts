/**
 * SES-05: Caller Cancellation
 *
 * Aborting the caller's signal answers request_cancelled at once and never
 * hands that caller a token. The exchange keeps running and its session is
 * cached for the next callback.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorMessages } from '@account-service/shared';
import { captureConsole } from '../support/console';
import type { ConsoleCapture } from '../support/console';
import { createFakeGoogle, createGate } from '../support/google';
import { createIssuerHarness, expectFailure, expectSession } from '../support/issuer';

describe('SES-05: Caller Cancellation', () => {
  let logs: ConsoleCapture;

  beforeEach(() => {
    logs = captureConsole();
  });

  afterEach(() => {
    logs.spy.mockRestore();
  });

  it('should answer request_cancelled while the exchange finishes in the background', async () => {
    const gate = createGate();
    const google = createFakeGoogle({ tokenGate: gate.promise });
    const harness = createIssuerHarness({ google });
    const controller = new AbortController();

    const pending = harness.issuer.loginWithGoogle('code-1', { signal: controller.signal });
    controller.abort();

    const failure = expectFailure(await pending);
    expect(failure).toEqual({ kind: 'request_cancelled', message: ErrorMessages.REQUEST_CANCELLED });
    expect(harness.cache.pending).toBe(1);

    // The retry joins the exchange that is still running
    const retry = harness.issuer.loginWithGoogle('code-1');
    gate.open();
    const session = expectSession(await retry);

    expect(session.user.id).toBe('1');
    expect(harness.cache.get('code-1')).toEqual(session);
    expect(google.exchanges()).toBe(1);
  });

  it('should not start an exchange for a signal that is already aborted', async () => {
    const harness = createIssuerHarness();

    const failure = expectFailure(await harness.issuer.loginWithGoogle('code-1', { signal: AbortSignal.abort() }));

    expect(failure.kind).toBe('request_cancelled');
    expect(harness.google.exchanges()).toBe(0);
    expect(harness.cache.pending).toBe(0);
  });

  it('should withhold a cached session from a caller whose signal is already aborted', async () => {
    const harness = createIssuerHarness();
    const first = expectSession(await harness.issuer.loginWithGoogle('code-1'));

    const failure = expectFailure(await harness.issuer.loginWithGoogle('code-1', { signal: AbortSignal.abort() }));

    expect(failure).toEqual({ kind: 'request_cancelled', message: ErrorMessages.REQUEST_CANCELLED });
    expect(harness.issuer.stats.replayedCodes).toBe(0);
    expect(harness.cache.get('code-1')).toEqual(first);
    expect(harness.google.exchanges()).toBe(1);
  });

  it('should return the session when the signal never fires', async () => {
    const harness = createIssuerHarness();
    const controller = new AbortController();

    const session = expectSession(await harness.issuer.loginWithGoogle('code-1', { signal: controller.signal }));

    expect(session.user.email).toBe('ada@example.com');
  });
});
