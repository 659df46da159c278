import jwt from 'jsonwebtoken';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { appConfig } from '../../src/connections/config/app.config';
import { TestContext, bearer, createTestContext } from '../support/fixtures';

describe('app', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('GET /health', () => {
    it('reports a reachable database', async () => {
      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', database: 'connected' });
    });

    it('returns 503 when the database is down', async () => {
      ctx.db.pingError = new Error('connection refused');

      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 'error', database: 'disconnected' });
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(ctx.app).get('/api/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Route not found', error: { code: 'NOT_FOUND' } });
  });

  describe('authentication', () => {
    it('rejects an expired token', async () => {
      const user = ctx.db.addUser('manager', 'manager');
      const token = jwt.sign({ userId: user.id }, appConfig.jwtSecret, { expiresIn: -10 });

      const res = await request(ctx.app).get('/api/products').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('Token has expired');
    });

    it('rejects a token for a user that no longer exists', async () => {
      const res = await request(ctx.app).get('/api/products').set('Authorization', bearer({ id: 404 }));

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('User does not exist');
    });

    it('rejects a disabled account', async () => {
      const user = ctx.db.addUser('former', 'manager', false);

      const res = await request(ctx.app).get('/api/products').set('Authorization', bearer(user));

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('Account is disabled');
    });

    it('rejects a driver account without a driver profile', async () => {
      const user = ctx.db.addUser('newcomer', 'driver');

      const res = await request(ctx.app).get('/api/driver/status').set('Authorization', bearer(user));

      expect(res.status).toBe(403);
      expect(res.body).toEqual({
        success: false,
        message: 'No driver profile is linked to this account',
        error: { code: 'PERMISSION_DENIED' },
      });
    });
  });
});
