import { describe, it, expect, vi } from 'vitest';
import { createTestApp, makeRequest } from '../../../test/helpers.js';

const alice = {
  name: 'Alice',
  email: 'alice@example.com',
  age: 29,
  bio: 'Backend developer.',
};

describe('GET /user/profile', () => {
  it('returns the caller profile', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'GET', '/user/profile');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(alice);
  });

  it('resolves the caller per request', async () => {
    const { app } = createTestApp({ userId: 'user2' });

    const response = await makeRequest(app, 'GET', '/user/profile');

    expect(response.status).toBe(200);
    const data = await response.json();
    expect(data.name).toBe('Bob');
  });

  it('returns 404 when the caller has no profile', async () => {
    const { app } = createTestApp({ userId: 'nobody' });

    const response = await makeRequest(app, 'GET', '/user/profile');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'User profile not found' });
  });

  it('returns 404 when no identity is resolved', async () => {
    const { app } = createTestApp({ userId: null });

    const response = await makeRequest(app, 'GET', '/user/profile');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'User profile not found' });
  });
});

describe('PUT /user/profile', () => {
  it('merges email and age into the stored profile', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: { email: 'alice.new@example.com', age: 34 },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      name: 'Alice',
      email: 'alice.new@example.com',
      age: 34,
      bio: 'Backend developer.',
    });

    const after = await makeRequest(app, 'GET', '/user/profile');
    expect((await after.json()).email).toBe('alice.new@example.com');
  });

  it('returns the unchanged profile for an empty body', async () => {
    const { app, profileRepository } = createTestApp();
    const replaceSpy = vi.spyOn(profileRepository, 'replace');

    const response = await makeRequest(app, 'PUT', '/user/profile', { body: {} });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(alice);
    expect(replaceSpy).not.toHaveBeenCalled();
  });

  it('clears the bio when it is null', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', { body: { bio: null } });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ...alice, bio: null });
  });

  it('rejects an underage update with one record located at age', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', { body: { age: 15 } });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      detail: [{ loc: ['body', 'age'], msg: 'age must be between 18 and 120', type: 'value_error' }],
    });
  });

  it('reports every business rule violation in one response', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: { age: 15, email: 'bademail' },
    });

    expect(response.status).toBe(422);
    const data = await response.json();
    expect(data.detail).toEqual([
      { loc: ['body', 'email'], msg: 'value is not a valid email address', type: 'value_error.email' },
      { loc: ['body', 'age'], msg: 'age must be between 18 and 120', type: 'value_error' },
    ]);
  });

  it('uses the same shape for body type errors', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: { age: 'thirty', name: 42 },
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      detail: [
        { loc: ['body', 'name'], msg: 'Expected string, received number', type: 'type_error.string' },
        { loc: ['body', 'age'], msg: 'Expected number, received string', type: 'type_error.number' },
      ],
    });
  });

  it('reports type errors and rule violations from the same body together', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: '{"age":15,"name":42}',
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      detail: [
        {
          loc: ['body', 'name'],
          msg: 'Expected string, received number',
          type: 'type_error.string',
        },
        { loc: ['body', 'age'], msg: 'age must be between 18 and 120', type: 'value_error' },
      ],
    });
  });

  it('rejects unknown fields', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: { name: 'Alice', role: 'admin' },
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      detail: [{ loc: ['body', 'role'], msg: 'extra fields not permitted', type: 'value_error.extra' }],
    });
  });

  it('rejects malformed JSON with the same shape', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', { body: '{"age": 30' });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      detail: [
        { loc: ['body'], msg: 'Malformed JSON in request body', type: 'value_error.jsondecode' },
      ],
    });
  });

  it('rejects bodies sent without a JSON content type', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: 'age=30',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      detail: [
        {
          loc: ['body'],
          msg: 'Request body must be sent as application/json',
          type: 'value_error.jsondecode',
        },
      ],
    });
  });

  it.each(['application/json;', 'application/json ; charset=utf-8', 'application/json; charset'])(
    'rejects the content type %j instead of ignoring the body',
    async (contentType) => {
      const { app } = createTestApp();

      const response = await makeRequest(app, 'PUT', '/user/profile', {
        body: { age: 15 },
        headers: { 'Content-Type': contentType },
      });

      expect(response.status).toBe(422);
      expect(await response.json()).toEqual({
        detail: [
          {
            loc: ['body'],
            msg: 'Request body must be sent as application/json',
            type: 'value_error.jsondecode',
          },
        ],
      });
    }
  );

  it('applies updates sent with a charset parameter', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: { age: 34 },
      headers: { 'Content-Type': 'application/json; charset=utf-8' },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ...alice, age: 34 });
  });

  it('leaves the stored profile untouched when any field is invalid', async () => {
    const { app } = createTestApp();

    const response = await makeRequest(app, 'PUT', '/user/profile', {
      body: { name: 'Mallory', age: 121 },
    });
    expect(response.status).toBe(422);

    const after = await makeRequest(app, 'GET', '/user/profile');
    expect(await after.json()).toEqual(alice);
  });

  it('returns 404 rather than 422 for an unknown caller', async () => {
    const { app } = createTestApp({ userId: 'nobody' });

    const response = await makeRequest(app, 'PUT', '/user/profile', { body: { age: 15 } });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'User profile not found' });
  });

  it('keeps stores of separate apps apart', async () => {
    const first = createTestApp();
    const second = createTestApp();

    await makeRequest(first.app, 'PUT', '/user/profile', { body: { name: 'Alicia' } });

    const response = await makeRequest(second.app, 'GET', '/user/profile');
    expect((await response.json()).name).toBe('Alice');
  });
});
