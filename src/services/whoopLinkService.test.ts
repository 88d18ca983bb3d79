import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeWhoopServer } from '../testing/fakeWhoop';
import { MemoryCredentialStore, MemoryOAuthStateStore } from '../testing/memoryStores';
import { WhoopAuthService } from './whoopAuthService';
import { WhoopLinkService } from './whoopLinkService';

const NOW = new Date('2025-01-10T12:00:00.000Z');

describe('WhoopLinkService', () => {
  let server: FakeWhoopServer;
  let states: MemoryOAuthStateStore;
  let credentials: MemoryCredentialStore;
  let links: WhoopLinkService;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    server = new FakeWhoopServer();
    states = new MemoryOAuthStateStore();
    credentials = new MemoryCredentialStore();
    links = new WhoopLinkService(states, credentials, new WhoopAuthService(server.oauthOptions()), () => NOW);
  });

  it('binds a fresh state to the user in the consent URL', async () => {
    const url = new URL(await links.beginLink('u1'));

    expect(url.searchParams.get('state')).toBe('state-1');
    expect(states.states.get('state-1')).toBe('u1');
  });

  it('stores the credential for the user the state belongs to', async () => {
    await links.beginLink('u1');
    server.authorizationCodes.add('code-1');

    const result = await links.completeLink('code-1', 'state-1');

    expect(result).toEqual({ ok: true, value: { userId: 'u1' } });
    expect(credentials.items.get('u1')).toEqual({
      userId: 'u1',
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      scope: ['offline', 'read:profile', 'read:recovery', 'read:sleep', 'read:workout'],
      updatedAt: NOW,
    });
    expect(states.states.size).toBe(0);
  });

  it('accepts a state only once', async () => {
    await links.beginLink('u1');
    server.authorizationCodes.add('code-1');
    server.authorizationCodes.add('code-2');
    await links.completeLink('code-1', 'state-1');

    const replay = await links.completeLink('code-2', 'state-1');

    expect(replay).toEqual({
      ok: false,
      error: { kind: 'InvalidState', message: 'Invalid, expired or already used state' },
    });
    expect(credentials.puts).toBe(1);
    expect(server.tokenCalls).toHaveLength(1);
  });

  it('writes nothing for an unknown state', async () => {
    server.authorizationCodes.add('code-1');

    const result = await links.completeLink('code-1', 'forged');

    expect(result.ok ? null : result.error.kind).toBe('InvalidState');
    expect(server.tokenCalls).toHaveLength(0);
    expect(credentials.items.size).toBe(0);
  });

  it('consumes the state even when the exchange fails', async () => {
    await links.beginLink('u1');

    const failed = await links.completeLink('bad-code', 'state-1');
    expect(failed).toEqual({
      ok: false,
      error: { kind: 'ExchangeFailed', message: 'Token endpoint responded 400', status: 400 },
    });
    expect(credentials.items.size).toBe(0);

    server.authorizationCodes.add('code-1');
    const retry = await links.completeLink('code-1', 'state-1');
    expect(retry.ok ? null : retry.error.kind).toBe('InvalidState');
  });

  it('replaces an existing credential on relink', async () => {
    credentials.seed({ userId: 'u1', accessToken: 'old', refreshToken: 'old-refresh', scope: [], updatedAt: new Date(0) });
    await links.beginLink('u1');
    server.authorizationCodes.add('code-1');

    await links.completeLink('code-1', 'state-1');

    expect(credentials.items.get('u1')?.accessToken).toBe('access-1');
    expect(credentials.items.get('u1')?.refreshToken).toBe('refresh-1');
  });
});
