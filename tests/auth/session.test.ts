import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { MastodonClient } from '../../src/client/MastodonClient.js';
import { ApiError, IllegalArgumentError, NetworkError } from '../../src/client/types.js';
import { makeAccount } from '../helpers/fixtures.js';
import { MockServer, T0, fakeTime, type FakeTime } from '../helpers/mock-server.js';

let server: MockServer;
let time: FakeTime;
let dir: string;

beforeEach(async () => {
  server = new MockServer();
  await server.start();
  time = fakeTime(T0);
  dir = mkdtempSync(join(tmpdir(), 'session-'));
});

afterEach(async () => {
  await server.stop();
  rmSync(dir, { recursive: true, force: true });
});

function makeClient(logger = { debug: vi.fn(), warn: vi.fn() }) {
  return new MastodonClient({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    apiBaseUrl: server.baseUrl,
    clock: time.clock,
    sleep: time.sleep,
    logger,
  });
}

describe('createApp', () => {
  it('registers an app with space-joined scopes and the out-of-band redirect', async () => {
    server.enqueue({ body: { id: '1', client_id: 'test-client-id', client_secret: 'test-client-secret' } });

    const app = await MastodonClient.createApp('test-app', { apiBaseUrl: server.baseUrl });

    expect(app).toEqual({ clientId: 'test-client-id', clientSecret: 'test-client-secret' });
    const [request] = server.requests;
    expect(request?.method).toBe('POST');
    expect(request?.path).toBe('/api/v1/apps');
    expect(request?.headers.authorization).toBeUndefined();
    const form = new URLSearchParams(request?.body);
    expect(form.get('client_name')).toBe('test-app');
    expect(form.get('scopes')).toBe('read write follow');
    expect(form.get('redirect_uris')).toBe('urn:ietf:wg:oauth:2.0:oob');
  });

  it('persists the credentials in a file a new session can start from', async () => {
    server.enqueue({ body: { client_id: 'test-client-id', client_secret: 'test-client-secret' } });
    const path = join(dir, 'clientcred.secret');

    await MastodonClient.createApp('test-app', {
      apiBaseUrl: server.baseUrl,
      scopes: ['read'],
      redirectUris: 'https://app.example/callback',
      toFile: path,
    });

    expect(readFileSync(path, 'utf8')).toBe('test-client-id\ntest-client-secret\n');
    const form = new URLSearchParams(server.requests[0]?.body);
    expect(form.get('scopes')).toBe('read');
    expect(form.get('redirect_uris')).toBe('https://app.example/callback');

    const client = new MastodonClient({ clientId: path, apiBaseUrl: server.baseUrl });
    expect(client.clientId).toBe('test-client-id');
  });

  it('rejects a registration response without credentials', async () => {
    server.enqueue({ body: { id: '1' } });

    await expect(MastodonClient.createApp('test-app', { apiBaseUrl: server.baseUrl })).rejects.toThrow(
      new ApiError('App registration response did not contain client credentials'),
    );
  });
});

describe('logIn', () => {
  it('requests a password grant and uses the token for later calls', async () => {
    server.enqueue(
      { body: { access_token: 'test-access-token', token_type: 'bearer', scope: 'write read follow' } },
      { body: makeAccount() },
    );
    const client = makeClient();

    const token = await client.logIn('alice@example.social', 'test-password');

    expect(token).toBe('test-access-token');
    expect(client.accessToken).toBe('test-access-token');

    const form = new URLSearchParams(server.requests[0]?.body);
    expect(server.requests[0]?.path).toBe('/oauth/token');
    expect(Object.fromEntries(form)).toEqual({
      username: 'alice@example.social',
      password: 'test-password',
      client_id: 'test-client',
      client_secret: 'test-secret',
      grant_type: 'password',
      scope: 'read write follow',
    });

    await client.accountVerifyCredentials();
    expect(server.requests[1]?.headers.authorization).toBe('Bearer test-access-token');
  });

  it('writes the token to a file when asked', async () => {
    server.enqueue({ body: { access_token: 'test-access-token', scope: 'read' } });
    const path = join(dir, 'usercred.secret');

    await makeClient().logIn('alice@example.social', 'test-password', { scopes: ['read'], toFile: path });

    expect(readFileSync(path, 'utf8')).toBe('test-access-token\n');
  });

  it('rejects a token whose granted scopes differ and does not keep it', async () => {
    server.enqueue({ body: { access_token: 'test-access-token', scope: 'read' } });
    const client = makeClient();

    const error = await client
      .logIn('alice@example.social', 'test-password', { scopes: ['read', 'write'] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'Granted scopes "read" differ from requested scopes "read write"',
    });
    expect(client.accessToken).toBeUndefined();
  });

  it('masks a rejected login behind a generic error but keeps the cause', async () => {
    server.enqueue({ status: 401, body: { error: 'invalid_grant' } });
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const client = makeClient(logger);

    const error = await client.logIn('alice@example.social', 'wrong').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IllegalArgumentError);
    expect(error).toMatchObject({ message: 'Invalid user name, password or scopes' });
    expect(error instanceof Error ? error.cause : undefined).toBeDefined();
    expect(logger.warn).toHaveBeenCalledWith('password login failed', expect.any(Object));
    expect(client.accessToken).toBeUndefined();
  });

  it('masks transport failures the same way', async () => {
    const client = makeClient();
    await server.stop();

    const error = await client.logIn('alice@example.social', 'test-password').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IllegalArgumentError);
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(NetworkError);
  });
});
