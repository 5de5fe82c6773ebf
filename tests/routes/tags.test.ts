import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createAuthedUser, createTestContext, type AuthedUser, type TestContext } from '../helpers.js';

describe('/api/tags', () => {
  let ctx: TestContext;
  let owner: AuthedUser;

  beforeEach(async () => {
    ctx = await createTestContext();
    owner = await createAuthedUser(ctx, 'owner@example.com');
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  async function createTag(name: string, auth = owner.auth): Promise<number> {
    const res = await request(ctx.app).post('/api/tags').set('Authorization', auth).send({ name });
    expect(res.status).toBe(201);
    return res.body.id;
  }

  async function createRecipe(title: string, tags: number[]): Promise<void> {
    const res = await request(ctx.app)
      .post('/api/recipes')
      .set('Authorization', owner.auth)
      .send({ title, time_minutes: 10, price: 1, tags });
    expect(res.status).toBe(201);
  }

  it('requires authentication', async () => {
    const res = await request(ctx.app).get('/api/tags');

    expect(res.status).toBe(401);
    expect(res.body.code).toBe('AUTHENTICATION_REQUIRED');
  });

  it('answers 401 before validating the body', async () => {
    const res = await request(ctx.app).post('/api/tags').send({ name: '' });

    expect(res.status).toBe(401);
  });

  it('creates a tag', async () => {
    const res = await request(ctx.app).post('/api/tags').set('Authorization', owner.auth).send({ name: ' Vegan ' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ id: expect.any(Number), name: 'Vegan' });
  });

  it('rejects a duplicate name for the same user only', async () => {
    await createTag('Vegan');
    const other = await createAuthedUser(ctx, 'other@example.com');

    const duplicate = await request(ctx.app).post('/api/tags').set('Authorization', owner.auth).send({ name: 'Vegan' });
    const otherUser = await request(ctx.app).post('/api/tags').set('Authorization', other.auth).send({ name: 'Vegan' });

    expect(duplicate.status).toBe(400);
    expect(duplicate.body.fields).toEqual({ name: ['There is already a tag with this name registered.'] });
    expect(otherUser.status).toBe(201);
  });

  it('rejects a blank name', async () => {
    const res = await request(ctx.app).post('/api/tags').set('Authorization', owner.auth).send({ name: '  ' });

    expect(res.status).toBe(400);
    expect(res.body.fields).toEqual({ name: ['This field may not be blank.'] });
  });

  it('lists only the own tags, name descending', async () => {
    await createTag('Dessert');
    await createTag('Vegan');
    await createTag('Keto');
    const other = await createAuthedUser(ctx, 'other@example.com');
    await createTag('Zesty', other.auth);

    const res = await request(ctx.app).get('/api/tags').set('Authorization', owner.auth);

    expect(res.status).toBe(200);
    expect(res.body.map((tag: { name: string }) => tag.name)).toEqual(['Vegan', 'Keto', 'Dessert']);
  });

  it('filters by name', async () => {
    await createTag('Vegan');
    await createTag('Vegetarian');
    await createTag('Keto');

    const res = await request(ctx.app).get('/api/tags?name=VEG').set('Authorization', owner.auth);

    expect(res.body.map((tag: { name: string }) => tag.name)).toEqual(['Vegetarian', 'Vegan']);
  });

  it('lists assigned tags once', async () => {
    const breakfast = await createTag('Breakfast');
    await createTag('Lunch');
    await createRecipe('Eggs', [breakfast]);
    await createRecipe('Pancakes', [breakfast]);

    const res = await request(ctx.app).get('/api/tags?assigned_only=1').set('Authorization', owner.auth);

    expect(res.body).toEqual([{ id: breakfast, name: 'Breakfast' }]);
  });

  it('returns, updates and deletes a tag', async () => {
    const id = await createTag('Vegan');

    const fetched = await request(ctx.app).get(`/api/tags/${id}`).set('Authorization', owner.auth);
    expect(fetched.body).toEqual({ id, name: 'Vegan' });

    const patched = await request(ctx.app)
      .patch(`/api/tags/${id}`)
      .set('Authorization', owner.auth)
      .send({ name: 'Plant based' });
    expect(patched.status).toBe(200);
    expect(patched.body).toEqual({ id, name: 'Plant based' });

    const deleted = await request(ctx.app).delete(`/api/tags/${id}`).set('Authorization', owner.auth);
    expect(deleted.status).toBe(204);
    expect(deleted.text).toBe('');

    const missing = await request(ctx.app).get(`/api/tags/${id}`).set('Authorization', owner.auth);
    expect(missing.status).toBe(404);
  });

  it('allows a tag to keep its own name on a full update', async () => {
    const id = await createTag('Vegan');

    const res = await request(ctx.app).put(`/api/tags/${id}`).set('Authorization', owner.auth).send({ name: 'Vegan' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id, name: 'Vegan' });
  });

  it('requires the name on a full update', async () => {
    const id = await createTag('Vegan');

    const res = await request(ctx.app).put(`/api/tags/${id}`).set('Authorization', owner.auth).send({});

    expect(res.status).toBe(400);
    expect(res.body.fields).toEqual({ name: ['This field is required.'] });
  });

  it("hides other users' tags", async () => {
    const other = await createAuthedUser(ctx, 'other@example.com');
    const id = await createTag('Secret', other.auth);

    const get = await request(ctx.app).get(`/api/tags/${id}`).set('Authorization', owner.auth);
    const del = await request(ctx.app).delete(`/api/tags/${id}`).set('Authorization', owner.auth);

    expect(get.status).toBe(404);
    expect(get.body).toEqual({ error: 'Not found.', code: 'NOT_FOUND' });
    expect(del.status).toBe(404);
  });

  it('answers 404 for non-numeric ids', async () => {
    const res = await request(ctx.app).get('/api/tags/abc').set('Authorization', owner.auth);

    expect(res.status).toBe(404);
  });

  it('answers 400 for malformed JSON', async () => {
    const res = await request(ctx.app)
      .post('/api/tags')
      .set('Authorization', owner.auth)
      .set('Content-Type', 'application/json')
      .send('{"name": ');

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('BAD_REQUEST');
  });
});
