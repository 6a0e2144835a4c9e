import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';
import { TestServer, jsonRequest, readJson, startTestServer } from '../../__tests__/support/http';

describe('/auth', () => {
  let server: TestServer;

  before(async () => {
    server = await startTestServer();
  });

  after(async () => {
    await server.close();
  });

  const post = (path: string, body?: unknown, token?: string) => {
    const init = jsonRequest(null, body);
    if (token) {
      init.headers = { 'Content-Type': 'application/json', Authorization: token };
    }
    return fetch(`${server.baseUrl}/auth${path}`, init);
  };
  const profile = (authorization?: string) =>
    fetch(`${server.baseUrl}/auth/profile`, { headers: authorization ? { Authorization: authorization } : {} });

  const signup = {
    username: 'carol',
    email: 'Carol@Example.com',
    password: 'password123',
    confirm_password: 'password123',
  };

  async function login(username: string, password: string): Promise<string> {
    const res = await post('/login', { username, password });
    assert.equal(res.status, 200);
    return String((await readJson(res)).token);
  }

  it('creates accounts', async () => {
    const res = await post('/signup', signup);
    const body = await readJson(res);

    assert.equal(res.status, 201);
    assert.equal(body.message, 'Account created successfully! You can now log in.');
    assert.match(String(body.api_key), /^[A-Za-z0-9_-]{43}$/);
    const user = body.user;
    assert.ok(typeof user === 'object' && user !== null && 'email' in user && 'username' in user);
    assert.equal(user.username, 'carol');
    assert.equal(user.email, 'carol@example.com');
  });

  it('rejects duplicate and invalid signups', async () => {
    const duplicate = await post('/signup', { ...signup, email: 'other@example.com' });
    assert.equal(duplicate.status, 409);
    assert.deepEqual(await readJson(duplicate), { error: 'Username already exists.', code: 'CONFLICT' });

    const invalid = await post('/signup', { username: 'x', email: 'nope', password: 'short', confirm_password: 'short' });
    assert.equal(invalid.status, 400);
    assert.deepEqual(await readJson(invalid), {
      error: 'Validation failed',
      code: 'BAD_REQUEST',
      details: [
        'Username must be 3-50 characters and contain only letters, numbers, and underscores.',
        'Please enter a valid email address.',
        'Password must be at least 8 characters long.',
      ],
    });
  });

  it('logs in and shows the profile with the API key', async () => {
    const token = await login('carol@example.com', 'password123');

    const res = await profile(`Bearer ${token}`);
    const body = await readJson(res);

    assert.equal(res.status, 200);
    const user = body.user;
    assert.ok(typeof user === 'object' && user !== null && 'api_key' in user && 'username' in user);
    assert.equal(user.username, 'carol');
    assert.match(String(user.api_key), /^[A-Za-z0-9_-]{43}$/);
  });

  it('rejects bad credentials', async () => {
    const wrong = await post('/login', { username: 'carol', password: 'password999' });
    assert.equal(wrong.status, 401);
    assert.equal((await readJson(wrong)).error, 'Invalid username/email or password.');

    const missing = await post('/login', { username: 'carol' });
    assert.equal(missing.status, 400);
    assert.equal((await readJson(missing)).error, 'Please enter both username and password.');
  });

  it('requires a session token for the profile', async () => {
    const cases: Array<[string | undefined, string]> = [
      [undefined, 'Missing Authorization header'],
      ['Token abc', 'Invalid Authorization header format'],
      ['Bearer not-a-jwt', 'Invalid or expired token'],
      ['Bearer test-key-alice', 'Invalid or expired token'],
    ];
    for (const [authorization, error] of cases) {
      const res = await profile(authorization);
      assert.equal(res.status, 401);
      assert.equal((await readJson(res)).error, error);
    }
  });

  it('regenerates the API key', async () => {
    const token = await login('carol', 'password123');
    const current = (await readJson(await profile(`Bearer ${token}`))).user;
    assert.ok(typeof current === 'object' && current !== null && 'api_key' in current);
    const oldKey = String(current.api_key);

    const res = await post('/regenerate-api-key', undefined, `Bearer ${token}`);
    const body = await readJson(res);
    assert.equal(res.status, 200);
    assert.equal(body.message, 'API key regenerated successfully!');
    const newKey = String(body.api_key);
    assert.notEqual(newKey, oldKey);

    const stale = await fetch(`${server.baseUrl}/api/jobs`, { headers: { 'X-API-Key': oldKey } });
    assert.equal(stale.status, 401);
    const fresh = await fetch(`${server.baseUrl}/api/jobs`, { headers: { 'X-API-Key': newKey } });
    assert.equal(fresh.status, 200);
  });
});
