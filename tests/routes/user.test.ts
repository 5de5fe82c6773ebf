import { eq } from 'drizzle-orm';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { users } from '../../src/db/schema.js';
import { createAuthedUser, createTestContext, TEST_PASSWORD, type TestContext } from '../helpers.js';

describe('/api/user', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  describe('POST /create', () => {
    it('registers a user without echoing the password', async () => {
      const res = await request(ctx.app)
        .post('/api/user/create')
        .send({ email: 'a@test.com', password: 'pass123', name: 'Test' });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ email: 'a@test.com', name: 'Test' });
    });

    it('rejects a duplicate email', async () => {
      await request(ctx.app).post('/api/user/create').send({ email: 'a@test.com', password: 'pass123', name: 'Test' });
      const res = await request(ctx.app)
        .post('/api/user/create')
        .send({ email: 'a@test.com', password: 'pass123', name: 'Again' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'Validation failed.',
        code: 'VALIDATION_ERROR',
        fields: { email: ['user with this email already exists.'] },
      });
    });

    it('rejects a short password and a malformed email together', async () => {
      const res = await request(ctx.app)
        .post('/api/user/create')
        .send({ email: 'not-an-email', password: 'pw', name: 'Test' });

      expect(res.status).toBe(400);
      expect(res.body.fields).toEqual({
        email: ['Enter a valid email address.'],
        password: ['Ensure this field has at least 5 characters.'],
      });
    });

    it('does not require authentication', async () => {
      const { auth } = await createAuthedUser(ctx);
      const res = await request(ctx.app)
        .post('/api/user/create')
        .set('Authorization', auth)
        .send({ email: 'b@test.com', password: 'pass123', name: 'B' });

      expect(res.status).toBe(201);
    });
  });

  describe('POST /token', () => {
    it('returns a token for valid credentials', async () => {
      const { token } = await createAuthedUser(ctx, 'cook@example.com');
      const res = await request(ctx.app)
        .post('/api/user/token')
        .send({ email: 'cook@example.com', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ token });
    });

    it('rejects a wrong password', async () => {
      await createAuthedUser(ctx, 'cook@example.com');
      const res = await request(ctx.app)
        .post('/api/user/token')
        .send({ email: 'cook@example.com', password: 'wrong-pass' });

      expect(res.status).toBe(400);
      expect(res.body.fields).toEqual({
        non_field_errors: ['Unable to authenticate with provided credentials.'],
      });
    });

    it('requires both fields', async () => {
      const res = await request(ctx.app).post('/api/user/token').send({ email: '', password: '' });

      expect(res.status).toBe(400);
      expect(res.body.fields).toEqual({
        email: ['This field may not be blank.'],
        password: ['This field may not be blank.'],
      });
    });
  });

  describe('/me', () => {
    it('requires authentication', async () => {
      const res = await request(ctx.app).get('/api/user/me');

      expect(res.status).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Token');
      expect(res.body).toEqual({
        error: 'Authentication credentials were not provided.',
        code: 'AUTHENTICATION_REQUIRED',
      });
    });

    it('rejects unknown and malformed tokens', async () => {
      const unknown = await request(ctx.app).get('/api/user/me').set('Authorization', 'Token not-a-real-token');
      const malformed = await request(ctx.app).get('/api/user/me').set('Authorization', 'Token');

      expect(unknown.status).toBe(401);
      expect(unknown.body.error).toBe('Invalid token.');
      expect(malformed.status).toBe(401);
      expect(malformed.body.error).toBe('Invalid token header.');
    });

    it('rejects tokens of inactive users', async () => {
      const { user, auth } = await createAuthedUser(ctx);
      await ctx.db.update(users).set({ isActive: false }).where(eq(users.id, user.id));

      const res = await request(ctx.app).get('/api/user/me').set('Authorization', auth);

      expect(res.status).toBe(401);
      expect(res.body.error).toBe('User inactive or deleted.');
    });

    it('accepts the Bearer keyword', async () => {
      const { token } = await createAuthedUser(ctx, 'cook@example.com');
      const res = await request(ctx.app).get('/api/user/me').set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ email: 'cook@example.com', name: 'Test User' });
    });

    it('updates the profile partially', async () => {
      const { auth } = await createAuthedUser(ctx, 'cook@example.com');
      const res = await request(ctx.app).patch('/api/user/me').set('Authorization', auth).send({ name: 'Chef' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ email: 'cook@example.com', name: 'Chef' });
    });

    it('logs in with a changed password', async () => {
      const { auth } = await createAuthedUser(ctx, 'cook@example.com');
      await request(ctx.app).patch('/api/user/me').set('Authorization', auth).send({ password: 'changed-pass' });

      const res = await request(ctx.app)
        .post('/api/user/token')
        .send({ email: 'cook@example.com', password: 'changed-pass' });

      expect(res.status).toBe(200);
    });

    it('keeps the own email on a full update', async () => {
      const { auth } = await createAuthedUser(ctx, 'cook@example.com');
      const res = await request(ctx.app)
        .put('/api/user/me')
        .set('Authorization', auth)
        .send({ email: 'cook@example.com', password: 'another-pass', name: 'Cook' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ email: 'cook@example.com', name: 'Cook' });
    });
  });
});
