import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { noDataSource } from '../helpers/fake-data-source';

/**
 * E2E tests for the users bridge endpoints, against an in-process Postgres store
 * seeded with SEED_USERS (alice's stored credential is hex(SHA-256("secret"))).
 */

type UserBody = Record<string, string>;

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

function ids(users: UserBody[]): Array<string | undefined> {
  return users.map((u) => u.id);
}

describe('GET /users', () => {
  it('lists every user when no search or page is given', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/users' });

      expect(res.statusCode).toBe(200);
      const body = readJson<{ users: UserBody[] }>(res);
      expect(ids(body.users)).toEqual(['1', '2', '3', '4', '5', '6']);
      expect(body.users[0]).toEqual({
        id: '1',
        username: 'alice',
        email: 'alice@example.com',
        first_name: 'Alice',
        last_name: 'Anders',
      });
    } finally {
      await close();
    }
  });

  it('pages and searches', async () => {
    const { app, close } = await buildTestApp();
    try {
      const paged = await app.inject({ method: 'GET', url: '/users?offset=1&limit=2' });
      expect(ids(readJson<{ users: UserBody[] }>(paged).users)).toEqual(['2', '3']);

      const searched = await app.inject({ method: 'GET', url: '/users?search=ali' });
      expect(ids(readJson<{ users: UserBody[] }>(searched).users)).toEqual(['1', '5']);
    } finally {
      await close();
    }
  });

  it('rejects an offset without a limit', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({ method: 'GET', url: '/users?offset=1' });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });
});

describe('GET /users/count', () => {
  it('counts all users, or those matching a search term', async () => {
    const { app, close } = await buildTestApp();
    try {
      const all = await app.inject({ method: 'GET', url: '/users/count' });
      expect(readJson<{ count: number }>(all)).toEqual({ count: 6 });

      const searched = await app.inject({ method: 'GET', url: '/users/count?search=ali' });
      expect(readJson<{ count: number }>(searched)).toEqual({ count: 2 });
    } finally {
      await close();
    }
  });

  it('lenient mode: reports 0 when the store is unavailable', async () => {
    const { app, close } = await buildTestApp({ dataSources: noDataSource });
    try {
      const res = await app.inject({ method: 'GET', url: '/users/count' });

      expect(res.statusCode).toBe(200);
      expect(readJson<{ count: number }>(res)).toEqual({ count: 0 });
    } finally {
      await close();
    }
  });

  it('strict mode: reports 503 when the store is unavailable', async () => {
    const { app, close } = await buildTestApp({
      dataSources: noDataSource,
      config: { queryErrorMode: 'strict' },
    });
    try {
      const res = await app.inject({ method: 'GET', url: '/users/count' });

      expect(res.statusCode).toBe(503);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'UNAVAILABLE', message: 'User store is unavailable.' },
      });
    } finally {
      await close();
    }
  });
});

describe('single user lookups', () => {
  it('finds by id, username and email', async () => {
    const { app, close } = await buildTestApp();
    try {
      const byId = await app.inject({ method: 'GET', url: '/users/3' });
      expect(byId.statusCode).toBe(200);
      expect(readJson<UserBody>(byId)).toEqual({
        id: '3',
        username: 'carol',
        email: 'carol@example.org',
        first_name: 'Carol',
      });

      const byUsername = await app.inject({ method: 'GET', url: '/users/by-username/bob' });
      expect(readJson<UserBody>(byUsername).email).toBe('bob@example.com');

      const byEmail = await app.inject({ method: 'GET', url: '/users/by-email/eve@example.net' });
      expect(readJson<UserBody>(byEmail).username).toBe('eve');
    } finally {
      await close();
    }
  });

  it('returns 404 for unknown users and 400 for a non-integer id', async () => {
    const { app, close } = await buildTestApp();
    try {
      const missing = await app.inject({ method: 'GET', url: '/users/by-username/mallory' });
      expect(missing.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(missing).error.code).toBe('NOT_FOUND');

      const missingId = await app.inject({ method: 'GET', url: '/users/99' });
      expect(missingId.statusCode).toBe(404);

      const badId = await app.inject({ method: 'GET', url: '/users/abc' });
      expect(badId.statusCode).toBe(400);
    } finally {
      await close();
    }
  });
});

describe('POST /users/credentials/validate', () => {
  it('validates against the stored digest, lower-casing the password', async () => {
    const { app, close } = await buildTestApp();
    try {
      const ok = await app.inject({
        method: 'POST',
        url: '/users/credentials/validate',
        payload: { username: 'alice', password: 'SECRET' },
      });
      expect(ok.statusCode).toBe(200);
      expect(readJson<{ valid: boolean }>(ok)).toEqual({ valid: true });

      const wrong = await app.inject({
        method: 'POST',
        url: '/users/credentials/validate',
        payload: { username: 'alice', password: 'secret!' },
      });
      expect(readJson<{ valid: boolean }>(wrong)).toEqual({ valid: false });

      const unknown = await app.inject({
        method: 'POST',
        url: '/users/credentials/validate',
        payload: { username: 'mallory', password: 'secret' },
      });
      expect(readJson<{ valid: boolean }>(unknown)).toEqual({ valid: false });
    } finally {
      await close();
    }
  });

  it('rejects a body without a password', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users/credentials/validate',
        payload: { username: 'alice' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });
});

describe('write endpoints', () => {
  it('PUT /users/:username/credentials is not implemented', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'PUT',
        url: '/users/alice/credentials',
        payload: { password: 'new-secret' },
      });

      expect(res.statusCode).toBe(501);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'NOT_IMPLEMENTED', message: 'Password update not supported.' },
      });
    } finally {
      await close();
    }
  });

  it('DELETE /users/:id follows the removal capability flag', async () => {
    const denied = await buildTestApp();
    try {
      const res = await denied.app.inject({ method: 'DELETE', url: '/users/1' });
      expect(res.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('FORBIDDEN');
    } finally {
      await denied.close();
    }

    const allowed = await buildTestApp({ queries: { allowDelete: true } });
    try {
      const res = await allowed.app.inject({ method: 'DELETE', url: '/users/1' });
      expect(res.statusCode).toBe(204);

      // nothing is deleted from the store itself
      const count = await allowed.app.inject({ method: 'GET', url: '/users/count' });
      expect(readJson<{ count: number }>(count)).toEqual({ count: 6 });
    } finally {
      await allowed.close();
    }
  });
});
