import request from 'supertest';

jest.mock('../../kafka/producer', () => {
  const mockSend = jest.fn().mockResolvedValue(undefined);
  return {
    __esModule: true,
    _mockSendFn: mockSend,
    isKafkaEnabled: jest.fn().mockReturnValue(true),
    configureKafka: jest.fn().mockReturnValue(true),
    getKafkaProducer: jest.fn().mockResolvedValue({ send: mockSend }),
    disconnectProducer: jest.fn().mockResolvedValue(undefined),
  };
});

import { PostModel } from '../../db/models';
import { createTestContext, createUser, resetDatabase, TEST_PASSWORD, TestContext, TestUser } from '../helpers/testApp';

describe('Admin API', () => {
  let ctx: TestContext;
  let admin: TestUser;
  let alice: TestUser;

  beforeAll(async () => {
    ctx = await createTestContext();
  });

  beforeEach(async () => {
    await resetDatabase(ctx);
    admin = await createUser(ctx, 'root', { role: 'admin', isSuperuser: true });
    alice = await createUser(ctx, 'alice');
  });

  afterAll(async () => {
    await ctx.sequelize.close();
  });

  it('refuses regular users and anonymous callers', async () => {
    const forbidden = await request(ctx.app).get('/api/admin/users').set('Authorization', alice.auth);
    expect(forbidden.status).toBe(403);
    expect(forbidden.body.message).toBe('Admin access required');

    await request(ctx.app).get('/api/admin/stats').expect(401);
    await request(ctx.app).get('/api/posts/admin').set('Authorization', alice.auth).expect(403);
  });

  describe('users', () => {
    it('lists inactive users too and filters by role', async () => {
      const { user: gone } = await createUser(ctx, 'gone');
      await ctx.container.repositories.users.updateUser(gone.id, { isActive: false });

      const all = await request(ctx.app).get('/api/admin/users').set('Authorization', admin.auth);
      expect(all.status).toBe(200);
      expect(all.body.count).toBe(3);

      const admins = await request(ctx.app).get('/api/admin/users').query({ role: 'admin' }).set('Authorization', admin.auth);
      expect(admins.body.results.map((u: { username: string }) => u.username)).toEqual(['root']);

      const search = await request(ctx.app).get('/api/admin/users').query({ search: 'ALI' }).set('Authorization', admin.auth);
      expect(search.body.results.map((u: { username: string }) => u.username)).toEqual(['alice']);
    });

    it('shows a user with activity counts', async () => {
      await request(ctx.app).post('/api/posts').set('Authorization', alice.auth).send({ content: 'hi' }).expect(201);

      const res = await request(ctx.app).get(`/api/admin/users/${alice.user.id}`).set('Authorization', admin.auth);

      expect(res.body).toMatchObject({
        id: alice.user.id,
        username: 'alice',
        fullName: 'Alice Tester',
        role: 'user',
        isActive: true,
        isDeactivated: false,
        postsCount: 1,
        followersCount: 0,
      });
      await request(ctx.app).get('/api/admin/users/9999').set('Authorization', admin.auth).expect(404);
    });

    it('changes roles and flags', async () => {
      const res = await request(ctx.app).patch(`/api/admin/users/${alice.user.id}`).set('Authorization', admin.auth).send({ role: 'admin' });
      expect(res.status).toBe(200);
      expect(res.body.role).toBe('admin');

      const invalid = await request(ctx.app).put(`/api/admin/users/${alice.user.id}`).set('Authorization', admin.auth).send({ role: 'owner' });
      expect(invalid.status).toBe(400);
      expect(Object.keys(invalid.body.errors)).toEqual(['role']);
    });

    it('deactivates users, who can then no longer log in', async () => {
      const res = await request(ctx.app).post(`/api/admin/users/${alice.user.id}/deactivate`).set('Authorization', admin.auth);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'User alice deactivated successfully' });
      const stored = await ctx.container.repositories.users.findUserById(alice.user.id);
      expect(stored?.isDeactivated).toBe(true);
      expect(stored?.deactivatedAt).toBeInstanceOf(Date);

      const login = await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'alice', password: TEST_PASSWORD });
      expect(login.body.message).toBe('User account is disabled.');

      const reactivated = await request(ctx.app).patch(`/api/admin/users/${alice.user.id}`).set('Authorization', admin.auth).send({ isDeactivated: false });
      expect(reactivated.body.isDeactivated).toBe(false);
      const restored = await ctx.container.repositories.users.findUserById(alice.user.id);
      expect(restored?.deactivatedAt).toBeNull();
    });

    it('does not let admins deactivate themselves', async () => {
      const res = await request(ctx.app).post(`/api/admin/users/${admin.user.id}/deactivate`).set('Authorization', admin.auth);

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Cannot deactivate yourself');
    });

    it('reports platform statistics', async () => {
      await request(ctx.app).post('/api/posts').set('Authorization', alice.auth).send({ content: 'one' }).expect(201);
      await request(ctx.app).post('/api/posts').set('Authorization', alice.auth).send({ content: 'two' }).expect(201);
      await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'alice', password: TEST_PASSWORD }).expect(200);

      const res = await request(ctx.app).get('/api/admin/stats').set('Authorization', admin.auth);

      expect(res.body).toEqual({ totalUsers: 2, totalPosts: 2, activeToday: 1, newUsersToday: 2 });
    });
  });

  describe('content moderation', () => {
    const createPost = async (content: string, category = 'general'): Promise<number> => {
      const res = await request(ctx.app).post('/api/posts').set('Authorization', alice.auth).send({ content, category }).expect(201);
      return Number(res.body.id);
    };

    it('lists posts of any state', async () => {
      const active = await createPost('visible');
      const inactive = await createPost('hidden', 'question');
      await PostModel.update({ isActive: false }, { where: { id: inactive } });

      const all = await request(ctx.app).get('/api/posts/admin').set('Authorization', admin.auth);
      const onlyInactive = await request(ctx.app).get('/api/posts/admin').query({ status: 'inactive' }).set('Authorization', admin.auth);
      const onlyGeneral = await request(ctx.app).get('/api/posts/admin').query({ category: 'general' }).set('Authorization', admin.auth);

      expect(all.body.count).toBe(2);
      expect(onlyInactive.body.results.map((p: { id: number }) => p.id)).toEqual([inactive]);
      expect(onlyGeneral.body.results.map((p: { id: number }) => p.id)).toEqual([active]);
    });

    it('deletes any post, inactive ones included', async () => {
      const postId = await createPost('hidden');
      await PostModel.update({ isActive: false }, { where: { id: postId } });

      const res = await request(ctx.app).delete(`/api/posts/admin/${postId}/delete`).set('Authorization', admin.auth);

      expect(res.status).toBe(200);
      await request(ctx.app).delete(`/api/posts/admin/${postId}/delete`).set('Authorization', admin.auth).expect(404);
    });

    it('lists and deletes comments', async () => {
      const postId = await createPost('discuss');
      const comment = await request(ctx.app).post(`/api/posts/${postId}/comments`).set('Authorization', alice.auth).send({ content: 'spam' }).expect(201);

      const list = await request(ctx.app).get('/api/posts/admin/comments').set('Authorization', admin.auth);
      expect(list.body.count).toBe(1);
      expect(list.body.results[0]).toMatchObject({ content: 'spam', author: { username: 'alice' } });

      const res = await request(ctx.app).delete(`/api/posts/admin/comments/${comment.body.id}/delete`).set('Authorization', admin.auth);
      expect(res.status).toBe(200);
      const post = await request(ctx.app).get(`/api/posts/${postId}`).set('Authorization', alice.auth);
      expect(post.body.commentCount).toBe(0);
    });
  });
});
