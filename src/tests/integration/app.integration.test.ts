import request from 'supertest';
import { createTestContext, TestContext } from '../helpers/testApp';

describe('App', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await createTestContext();
  });

  afterAll(async () => {
    await ctx.sequelize.close();
  });

  describe('GET /health', () => {
    it('reports the database and the broker', async () => {
      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok', database: 'up', redis: 'disabled' });
    });

    it('answers 503 when the database is unreachable', async () => {
      const authenticate = jest.spyOn(ctx.sequelize, 'authenticate').mockRejectedValueOnce(new Error('connection refused'));

      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 'error', database: 'down', redis: 'disabled' });
      authenticate.mockRestore();
    });
  });

  it('answers unexpected failures with a generic 500', async () => {
    const health = jest.spyOn(ctx.container.broker, 'health').mockRejectedValueOnce(new Error('broker exploded'));

    const res = await request(ctx.app).get('/health').set('X-Correlation-ID', 'trace-500');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ message: 'Internal server error', correlationId: 'trace-500' });
    health.mockRestore();
  });

  describe('correlation ids', () => {
    it('echoes the caller\'s id', async () => {
      const res = await request(ctx.app).get('/api/nowhere').set('X-Correlation-ID', 'trace-123');

      expect(res.headers['x-correlation-id']).toBe('trace-123');
      expect(res.body.correlationId).toBe('trace-123');
    });

    it('mints one when none is sent', async () => {
      const res = await request(ctx.app).get('/health');

      expect(res.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(ctx.app).get('/api/nowhere');

    expect(res.status).toBe(404);
    expect(res.body.message).toBe('Not Found');
  });

  it('answers malformed JSON with 400', async () => {
    const res = await request(ctx.app)
      .post('/api/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"emailOrUsername":');

    expect(res.status).toBe(400);
    expect(typeof res.body.correlationId).toBe('string');
  });
});
