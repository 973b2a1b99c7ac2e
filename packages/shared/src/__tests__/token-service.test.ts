import { describe, it, expect } from 'vitest';
import { CredentialError } from '@gatehouse/domain';
import { JoseTokenService } from '../auth/token-service';

function createService(
  overrides: Partial<{ activeKid: string; keys: Array<{ kid: string; secret: string }>; accessTokenTtl: string }> = {},
) {
  return new JoseTokenService({
    activeKid: overrides.activeKid ?? 'key-1',
    keys: overrides.keys ?? [
      { kid: 'key-1', secret: 'a'.repeat(32) },
      { kid: 'key-2', secret: 'b'.repeat(32) },
    ],
    accessTokenTtl: overrides.accessTokenTtl ?? '900',
  });
}

async function rejection(promise: Promise<unknown>): Promise<CredentialError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CredentialError) return err;
    throw err;
  }
  throw new Error('expected the token to be rejected');
}

describe('JoseTokenService', () => {
  it('signs and verifies an access token', async () => {
    const service = createService();
    const token = await service.signAccessToken('user-123', 'sess-1');
    expect(token.split('.')).toHaveLength(3);

    await expect(service.verifyAccessToken(token)).resolves.toEqual({
      userId: 'user-123',
      sessionId: 'sess-1',
    });
  });

  it('verifies token signed with old key after rotation', async () => {
    const token = await createService({ activeKid: 'key-1' }).signAccessToken('user-456', 'sess-2');

    const result = await createService({ activeKid: 'key-2' }).verifyAccessToken(token);
    expect(result.userId).toBe('user-456');
  });

  it('rejects token signed with unknown key', async () => {
    const foreign = new JoseTokenService({
      activeKid: 'unknown-key',
      keys: [{ kid: 'unknown-key', secret: 'x'.repeat(32) }],
      accessTokenTtl: '900',
    });
    const token = await foreign.signAccessToken('user-789', 'sess-3');

    const err = await rejection(createService().verifyAccessToken(token));
    expect(err.reason).toBe('invalid');
  });

  it('rejects a tampered token as invalid', async () => {
    const service = createService();
    const token = await service.signAccessToken('user-1', 'sess-1');
    const [header, , signature] = token.split('.');
    const forged = Buffer.from(JSON.stringify({ sub: 'admin', sid: 'sess-1', iss: 'gatehouse' })).toString(
      'base64url',
    );

    const err = await rejection(service.verifyAccessToken(`${header}.${forged}.${signature}`));
    expect(err.reason).toBe('invalid');
  });

  it('reports an expired token as expired', async () => {
    const service = createService({ accessTokenTtl: '0' });
    const token = await service.signAccessToken('user-1', 'sess-1');

    const err = await rejection(service.verifyAccessToken(token));
    expect(err.reason).toBe('expired');
  });

  it('rejects garbage', async () => {
    const err = await rejection(createService().verifyAccessToken('not-a-token'));
    expect(err.reason).toBe('invalid');
  });

  it('throws if active kid is not found in keys', () => {
    expect(
      () =>
        new JoseTokenService({
          activeKid: 'nonexistent',
          keys: [{ kid: 'key-1', secret: 'a'.repeat(32) }],
          accessTokenTtl: '900',
        }),
    ).toThrow("Active JWT key 'nonexistent' not found in keys");
  });
});
