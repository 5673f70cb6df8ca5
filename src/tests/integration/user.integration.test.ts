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

import { createTestContext, createUser, resetDatabase, TestContext } from '../helpers/testApp';

const { _mockSendFn: mockSend } = jest.requireMock<{ _mockSendFn: jest.Mock }>('../../kafka/producer');

describe('Users API', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await createTestContext();
  });

  beforeEach(async () => {
    await resetDatabase(ctx);
    mockSend.mockClear();
  });

  afterAll(async () => {
    await ctx.sequelize.close();
  });

  describe('/api/users/me', () => {
    it('requires a bearer token', async () => {
      const missing = await request(ctx.app).get('/api/users/me');
      const invalid = await request(ctx.app).get('/api/users/me').set('Authorization', 'Bearer nope');

      expect(missing.status).toBe(401);
      expect(missing.body.message).toBe('Unauthorized: Access token is required.');
      expect(invalid.status).toBe(401);
      expect(invalid.body.message).toBe('Unauthorized: Invalid or expired token.');
    });

    it('rejects tokens of deactivated users', async () => {
      const { user, auth } = await createUser(ctx, 'alice');
      await ctx.container.repositories.users.updateUser(user.id, { isDeactivated: true });

      const res = await request(ctx.app).get('/api/users/me').set('Authorization', auth);

      expect(res.status).toBe(401);
    });

    it('returns and updates the own profile', async () => {
      const { user, auth } = await createUser(ctx, 'alice');

      const me = await request(ctx.app).get('/api/users/me').set('Authorization', auth);
      expect(me.status).toBe(200);
      expect(me.body).toMatchObject({ id: user.id, username: 'alice', email: 'alice@example.com', profileVisibility: 'public' });

      const res = await request(ctx.app).patch('/api/users/me').set('Authorization', auth).send({
        bio: 'Climber',
        website: 'https://alice.example.com',
        profileVisibility: 'private',
      });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ bio: 'Climber', website: 'https://alice.example.com', profileVisibility: 'private' });
    });

    it('validates profile fields', async () => {
      const { auth } = await createUser(ctx, 'alice');

      const res = await request(ctx.app).put('/api/users/me').set('Authorization', auth).send({
        bio: 'x'.repeat(161),
        website: 'not a url',
      });

      expect(res.status).toBe(400);
      expect(Object.keys(res.body.errors).sort()).toEqual(['bio', 'website']);
    });
  });

  describe('profiles by username', () => {
    it('respects profile visibility', async () => {
      const { user: alice, auth: aliceAuth } = await createUser(ctx, 'alice');
      const { auth: bobAuth } = await createUser(ctx, 'bob');
      await ctx.container.repositories.users.updateUser(alice.id, { profileVisibility: 'followers_only' });

      const hidden = await request(ctx.app).get('/api/users/alice').set('Authorization', bobAuth);
      expect(hidden.status).toBe(404);
      expect(hidden.body.message).toBe('User not found');

      await request(ctx.app).post(`/api/users/${alice.id}/follow`).set('Authorization', bobAuth).expect(201);
      const visible = await request(ctx.app).get('/api/users/alice').set('Authorization', bobAuth);
      expect(visible.status).toBe(200);
      expect(visible.body).toMatchObject({ username: 'alice', followersCount: 1, isFollowing: true });

      await ctx.container.repositories.users.updateUser(alice.id, { profileVisibility: 'private' });
      await request(ctx.app).get('/api/users/alice').set('Authorization', bobAuth).expect(404);
      await request(ctx.app).get('/api/users/alice').set('Authorization', aliceAuth).expect(200);
    });

    it('hides inactive users', async () => {
      const { user } = await createUser(ctx, 'alice');
      const { auth } = await createUser(ctx, 'bob');
      await ctx.container.repositories.users.updateUser(user.id, { isActive: false });

      await request(ctx.app).get('/api/users/alice').set('Authorization', auth).expect(404);
    });
  });

  describe('GET /api/users', () => {
    it('searches active users by name', async () => {
      await createUser(ctx, 'alice');
      await createUser(ctx, 'bob');
      const { auth } = await createUser(ctx, 'carol');

      const res = await request(ctx.app).get('/api/users').query({ search: 'BO' }).set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(res.body.count).toBe(1);
      expect(res.body.results.map((u: { username: string }) => u.username)).toEqual(['bob']);
      expect(res.body.results[0]).toMatchObject({ fullName: 'Bob Tester', role: 'user', followersCount: 0 });
    });

    it('paginates', async () => {
      await createUser(ctx, 'alice');
      await createUser(ctx, 'bob');
      const { auth } = await createUser(ctx, 'carol');

      const res = await request(ctx.app).get('/api/users').query({ page: '2', pageSize: '2' }).set('Authorization', auth);

      expect(res.body).toMatchObject({ count: 3, page: 2, pageSize: 2 });
      expect(res.body.results).toHaveLength(1);
    });

    it('applies the role filter for admins only', async () => {
      await createUser(ctx, 'root', { role: 'admin' });
      const { auth: userAuth } = await createUser(ctx, 'bob');
      const { auth: adminAuth } = await createUser(ctx, 'boss', { role: 'admin' });

      const asUser = await request(ctx.app).get('/api/users').query({ role: 'admin' }).set('Authorization', userAuth);
      const asAdmin = await request(ctx.app).get('/api/users').query({ role: 'admin' }).set('Authorization', adminAuth);

      expect(asUser.body.count).toBe(3);
      expect(asAdmin.body.count).toBe(2);
    });
  });

  describe('following', () => {
    it('follows, notifies and announces the follow', async () => {
      const { user: alice } = await createUser(ctx, 'alice');
      const { user: bob, auth: bobAuth } = await createUser(ctx, 'bob');
      mockSend.mockClear();

      const res = await request(ctx.app).post(`/api/users/${alice.id}/follow`).set('Authorization', bobAuth);

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ message: 'Successfully followed alice' });
      expect(ctx.pushed).toHaveLength(1);
      expect(ctx.pushed[0]).toMatchObject({
        userId: alice.id,
        event: 'notification',
        payload: {
          notification: {
            senderUsername: 'bob',
            notificationType: 'follow',
            title: 'New Follower',
            message: 'bob started following you',
            isRead: false,
          },
        },
      });
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(JSON.parse(mockSend.mock.calls[0][0].messages[0].value)).toMatchObject({
        eventType: 'UserFollowed',
        followerId: bob.id,
        followingId: alice.id,
      });
    });

    it('refuses self follows and repeats', async () => {
      const { user: alice } = await createUser(ctx, 'alice');
      const { user: bob, auth: bobAuth } = await createUser(ctx, 'bob');

      const self = await request(ctx.app).post(`/api/users/${bob.id}/follow`).set('Authorization', bobAuth);
      expect(self.status).toBe(400);
      expect(self.body.message).toBe('Cannot follow yourself');

      await request(ctx.app).post(`/api/users/${alice.id}/follow`).set('Authorization', bobAuth).expect(201);
      const again = await request(ctx.app).post(`/api/users/${alice.id}/follow`).set('Authorization', bobAuth);
      expect(again.status).toBe(400);
      expect(again.body.message).toBe('Already following this user');
    });

    it('returns 404 for unknown users', async () => {
      const { auth } = await createUser(ctx, 'bob');

      await request(ctx.app).post('/api/users/9999/follow').set('Authorization', auth).expect(404);
      await request(ctx.app).get('/api/users/9999/followers').set('Authorization', auth).expect(404);
      await request(ctx.app).get('/api/users/9999/following').set('Authorization', auth).expect(404);
    });

    it('unfollows and lists both directions', async () => {
      const { user: alice, auth: aliceAuth } = await createUser(ctx, 'alice');
      const { user: bob, auth: bobAuth } = await createUser(ctx, 'bob');
      await request(ctx.app).post(`/api/users/${alice.id}/follow`).set('Authorization', bobAuth).expect(201);

      const followers = await request(ctx.app).get(`/api/users/${alice.id}/followers`).set('Authorization', aliceAuth);
      expect(followers.body.count).toBe(1);
      expect(followers.body.results[0]).toMatchObject({ id: bob.id, username: 'bob', isFollowing: false });

      const following = await request(ctx.app).get(`/api/users/${bob.id}/following`).set('Authorization', bobAuth);
      expect(following.body.results[0]).toMatchObject({ id: alice.id, isFollowing: true });

      const res = await request(ctx.app).delete(`/api/users/${alice.id}/unfollow`).set('Authorization', bobAuth);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Successfully unfollowed alice' });

      const again = await request(ctx.app).delete(`/api/users/${alice.id}/unfollow`).set('Authorization', bobAuth);
      expect(again.status).toBe(400);
      expect(again.body.message).toBe('Not following this user');
    });
  });
});
