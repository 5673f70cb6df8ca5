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

import { createTestContext, createUser, resetDatabase, TestContext, TestUser } from '../helpers/testApp';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('Feed API', () => {
  let ctx: TestContext;
  let offsetMs = 0;
  let alice: TestUser;
  let bob: TestUser;
  let carol: TestUser;

  beforeAll(async () => {
    ctx = await createTestContext(() => new Date(Date.now() + offsetMs));
  });

  beforeEach(async () => {
    await resetDatabase(ctx);
    offsetMs = 0;
    alice = await createUser(ctx, 'alice');
    bob = await createUser(ctx, 'bob');
    carol = await createUser(ctx, 'carol');
  });

  afterAll(async () => {
    await ctx.sequelize.close();
  });

  const createPost = async (author: TestUser, content: string, category = 'general'): Promise<number> => {
    const res = await request(ctx.app).post('/api/posts').set('Authorization', author.auth).send({ content, category }).expect(201);
    return Number(res.body.id);
  };

  const ids = (body: { results: Array<{ id: number }> }) => body.results.map(post => post.id);

  describe('GET /api/feed', () => {
    it('shows own posts and posts of followed users', async () => {
      const own = await createPost(alice, 'mine');
      const followed = await createPost(bob, 'from bob');
      await createPost(carol, 'from carol');
      await request(ctx.app).post(`/api/users/${bob.user.id}/follow`).set('Authorization', alice.auth).expect(201);

      const res = await request(ctx.app).get('/api/feed').set('Authorization', alice.auth);

      expect(res.status).toBe(200);
      expect(ids(res.body)).toEqual([followed, own]);
      expect(res.body.feedInfo).toEqual({ totalPosts: 2, userFollowingCount: 1, feedType: 'personalized' });
    });

    it('narrows by category', async () => {
      await createPost(alice, 'chatter');
      const question = await createPost(alice, 'why?', 'question');

      const res = await request(ctx.app).get('/api/feed').query({ category: 'question' }).set('Authorization', alice.auth);

      expect(ids(res.body)).toEqual([question]);
    });
  });

  describe('GET /api/feed/trending', () => {
    it('orders recent posts by likes plus comments', async () => {
      const quiet = await createPost(alice, 'quiet');
      const liked = await createPost(alice, 'liked');
      const discussed = await createPost(bob, 'discussed');
      await request(ctx.app).post(`/api/posts/${liked}/like`).set('Authorization', bob.auth).expect(201);
      await request(ctx.app).post(`/api/posts/${liked}/like`).set('Authorization', carol.auth).expect(201);
      await request(ctx.app).post(`/api/posts/${discussed}/comments`).set('Authorization', carol.auth).send({ content: 'hm' }).expect(201);

      const res = await request(ctx.app).get('/api/feed/trending').set('Authorization', carol.auth);

      expect(res.status).toBe(200);
      expect(ids(res.body)).toEqual([liked, discussed, quiet]);
      expect(res.body.results[0]).toMatchObject({ likeCount: 2, isLiked: true });
      expect(res.body.feedInfo).toEqual({ totalPosts: 3, feedType: 'trending', timePeriod: '7 days' });
    });

    it('leaves out posts older than the window', async () => {
      const post = await createPost(alice, 'last week');
      offsetMs = 8 * DAY_MS;

      const week = await request(ctx.app).get('/api/feed/trending').set('Authorization', bob.auth);
      const month = await request(ctx.app).get('/api/feed/trending').query({ days: '30' }).set('Authorization', bob.auth);

      expect(week.body.count).toBe(0);
      expect(ids(month.body)).toEqual([post]);
      expect(month.body.feedInfo.timePeriod).toBe('30 days');
    });

    it('treats a window reaching before 1970 as all time', async () => {
      const post = await createPost(alice, 'fresh');

      const res = await request(ctx.app).get('/api/feed/trending').query({ days: '200000000' }).set('Authorization', bob.auth);

      expect(res.status).toBe(200);
      expect(ids(res.body)).toEqual([post]);
      expect(res.body.feedInfo.timePeriod).toBe('200000000 days');
    });

    it('rejects a bad window', async () => {
      const res = await request(ctx.app).get('/api/feed/trending').query({ days: 'zero' }).set('Authorization', bob.auth);

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual({ days: ['days must be a positive integer.'] });
    });
  });

  describe('GET /api/feed/category/:category', () => {
    it('lists active posts of one category from everyone', async () => {
      const first = await createPost(alice, 'news', 'announcement');
      const second = await createPost(carol, 'more news', 'announcement');
      await createPost(bob, 'not news');

      const res = await request(ctx.app).get('/api/feed/category/announcement').set('Authorization', bob.auth);

      expect(ids(res.body)).toEqual([second, first]);
      expect(res.body.feedInfo).toEqual({ category: 'announcement', totalPosts: 2, feedType: 'category' });
    });
  });
});
