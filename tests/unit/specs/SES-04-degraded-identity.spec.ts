/**
 * SES-04: Degraded Identity
 *
 * When the directory cannot resolve the user during a Google login, a token
 * is still issued for a pseudo identity derived from the email. The event is
 * logged with the failure kind, then audited and counted.
 */

import { createHash } from 'node:crypto';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { derivePseudoIdentity, isPseudoIdentity } from '@account-service/shared';
import { captureConsole } from '../support/console';
import type { ConsoleCapture } from '../support/console';
import { ConflictingDirectory, ThrowingDirectory, UnavailableDirectory } from '../support/directory';
import { createFakeGoogle } from '../support/google';
import { createIssuerHarness, expectSession } from '../support/issuer';

const ADA_PSEUDO_SUB = `pseudo_${createHash('sha256').update('ada@example.com').digest('hex').slice(0, 24)}`;

describe('SES-04: Degraded Identity', () => {
  let logs: ConsoleCapture;

  beforeEach(() => {
    logs = captureConsole();
  });

  afterEach(() => {
    logs.spy.mockRestore();
  });

  describe('derivePseudoIdentity', () => {
    it('should be pseudo_ plus 24 hex characters of the email digest', () => {
      expect(derivePseudoIdentity('ada@example.com')).toBe(ADA_PSEUDO_SUB);
      expect(ADA_PSEUDO_SUB).toMatch(/^pseudo_[0-9a-f]{24}$/);
    });

    it('should give emails that differ only in case distinct identities', () => {
      expect(derivePseudoIdentity('Ada@Example.com')).not.toBe(ADA_PSEUDO_SUB);
    });

    it('should be distinguishable from directory ids', () => {
      expect(isPseudoIdentity(ADA_PSEUDO_SUB)).toBe(true);
      expect(isPseudoIdentity('1')).toBe(false);
    });
  });

  it('should issue a valid token for the pseudo identity when the directory throws', async () => {
    const harness = createIssuerHarness({ directory: new ThrowingDirectory() });

    const session = expectSession(await harness.issuer.loginWithGoogle('code-1'));

    expect(session.user).toEqual({ id: ADA_PSEUDO_SUB, email: 'ada@example.com', first_name: 'Ada', last_name: 'Lovelace' });
    const verified = await harness.codec.verify(session.token);
    expect(verified.valid && verified.claims.sub).toBe(ADA_PSEUDO_SUB);
    expect(harness.issuer.stats.degradedLogins).toBe(1);
  });

  it('should degrade the same way when the directory returns unavailable', async () => {
    const directory = new UnavailableDirectory();
    const harness = createIssuerHarness({ directory });

    const session = expectSession(await harness.issuer.loginWithGoogle('code-1'));

    expect(session.user.id).toBe(ADA_PSEUDO_SUB);
    expect(directory.calls).toBe(1);
  });

  it('should derive the same subject for the same email across codes', async () => {
    const first = createIssuerHarness({ directory: new ThrowingDirectory() });
    const second = createIssuerHarness({ directory: new ThrowingDirectory() });

    const a = expectSession(await first.issuer.loginWithGoogle('code-1'));
    const b = expectSession(await second.issuer.loginWithGoogle('code-2'));

    expect(b.user.id).toBe(a.user.id);
  });

  it('should derive a different subject for a differently cased email', async () => {
    const mixedCase = createFakeGoogle({ profile: { email: 'ADA@example.com', given_name: 'Ada' } });
    const first = createIssuerHarness({ directory: new ThrowingDirectory() });
    const second = createIssuerHarness({ directory: new ThrowingDirectory(), google: mixedCase });

    const a = expectSession(await first.issuer.loginWithGoogle('code-1'));
    const b = expectSession(await second.issuer.loginWithGoogle('code-2'));

    expect(b.user.id).not.toBe(a.user.id);
    expect(b.user.email).toBe('ADA@example.com');
  });

  it('should log DIRECTORY_UNAVAILABLE at WARN and audit LOGIN_DEGRADED', async () => {
    const harness = createIssuerHarness({ directory: new ThrowingDirectory() });

    await harness.issuer.loginWithGoogle('code-1');

    const [warning] = logs.events('DIRECTORY_UNAVAILABLE');
    expect(warning.level).toBe('WARN');
    expect(warning.data).toEqual({
      event: 'DIRECTORY_UNAVAILABLE',
      kind: 'unavailable',
      pseudoSub: ADA_PSEUDO_SUB,
      reason: 'connection refused',
    });

    const [degraded] = logs.audits('LOGIN_DEGRADED');
    expect(degraded.actor).toEqual({ type: 'USER', sub: ADA_PSEUDO_SUB });
    expect(degraded.details).toEqual({
      method: 'google',
      email: 'ada@example.com',
      pseudoSub: ADA_PSEUDO_SUB,
      reason: 'connection refused',
    });
  });

  it('should log DIRECTORY_CONFLICT when a create conflicts and the re-read still misses', async () => {
    const directory = new ConflictingDirectory();
    const harness = createIssuerHarness({ directory });

    const session = expectSession(await harness.issuer.loginWithGoogle('code-1'));

    expect(session.user.id).toBe(ADA_PSEUDO_SUB);
    expect(directory.creates).toBe(1);
    expect(logs.events('DIRECTORY_UNAVAILABLE')).toEqual([]);
    const [warning] = logs.events('DIRECTORY_CONFLICT');
    expect(warning.level).toBe('WARN');
    expect(warning.data).toEqual({
      event: 'DIRECTORY_CONFLICT',
      kind: 'conflict',
      pseudoSub: ADA_PSEUDO_SUB,
      reason: 'email already registered',
    });
  });

  it('should cache the degraded session for the code', async () => {
    const harness = createIssuerHarness({ directory: new ThrowingDirectory() });

    const first = expectSession(await harness.issuer.loginWithGoogle('code-1'));
    const second = expectSession(await harness.issuer.loginWithGoogle('code-1'));

    expect(second).toEqual(first);
    expect(harness.google.exchanges()).toBe(1);
    expect(harness.issuer.stats.degradedLogins).toBe(1);
  });
});
