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

import { createTestContext, createUser, resetDatabase, TEST_PASSWORD, TestContext } from '../helpers/testApp';

const { _mockSendFn: mockSend } = jest.requireMock<{ _mockSendFn: jest.Mock }>('../../kafka/producer');

describe('Auth API', () => {
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

  const registration = {
    email: 'Dana@Example.com',
    username: 'dana',
    password: TEST_PASSWORD,
    passwordConfirm: TEST_PASSWORD,
    firstName: 'Dana',
    lastName: 'Scully',
  };

  describe('POST /api/auth/register', () => {
    it('creates an unverified account and announces it', async () => {
      const res = await request(ctx.app).post('/api/auth/register').send(registration);

      expect(res.status).toBe(201);
      expect(res.body.message).toBe('User registered successfully. Please check your email to verify your account.');
      expect(typeof res.body.userId).toBe('number');

      const stored = await ctx.container.repositories.users.findUserByUsername('dana');
      expect(stored?.email).toBe('dana@example.com');
      expect(stored?.isEmailVerified).toBe(false);

      expect(mockSend).toHaveBeenCalledTimes(1);
      const record = mockSend.mock.calls[0][0];
      expect(record.topic).toBe('social_events');
      expect(JSON.parse(record.messages[0].value)).toMatchObject({
        eventType: 'UserRegistered',
        userId: res.body.userId,
        username: 'dana',
        email: 'dana@example.com',
      });
    });

    it('reports duplicates and password problems per field', async () => {
      await createUser(ctx, 'dana');

      const res = await request(ctx.app).post('/api/auth/register').send({
        ...registration,
        email: 'dana@example.com',
        password: '1234567',
        passwordConfirm: '7654321',
      });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Validation failed');
      expect(res.body.errors).toEqual({
        email: ['A user with that email already exists.'],
        username: ['A user with that username already exists.'],
      });
    });

    it('reports a username taken between the lookup and the insert', async () => {
      await createUser(ctx, 'dana');
      const lookup = jest.spyOn(ctx.container.repositories.users, 'findUserByUsername').mockResolvedValueOnce(undefined);

      const res = await request(ctx.app).post('/api/auth/register').send({ ...registration, email: 'other@example.com' });
      lookup.mockRestore();

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual({ username: ['A user with that username already exists.'] });
      expect(mockSend).not.toHaveBeenCalled();
    });

    it('accepts only one of two simultaneous identical registrations', async () => {
      const [first, second] = await Promise.all([
        request(ctx.app).post('/api/auth/register').send(registration),
        request(ctx.app).post('/api/auth/register').send(registration),
      ]);

      expect([first.status, second.status].sort()).toEqual([201, 400]);
      const rejected = first.status === 400 ? first : second;
      expect(rejected.body.message).toBe('Validation failed');
      for (const field of Object.keys(rejected.body.errors)) {
        expect(['email', 'username']).toContain(field);
      }
    });

    it('lists every broken password rule', async () => {
      const res = await request(ctx.app).post('/api/auth/register').send({
        ...registration,
        password: '1234567',
        passwordConfirm: '7654321',
      });

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual({
        password: [
          'This password is too short. It must contain at least 8 characters.',
          'This password is entirely numeric.',
        ],
        passwordConfirm: ["Password fields didn't match."],
      });
    });

    it('rejects malformed usernames', async () => {
      const res = await request(ctx.app).post('/api/auth/register').send({ ...registration, username: 'no spaces' });

      expect(res.status).toBe(400);
      expect(res.body.errors.username).toEqual([
        'Username must be 3-30 characters long and contain only letters, numbers, and underscores.',
      ]);
    });
  });

  describe('POST /api/auth/verify-email', () => {
    it('verifies the account with the emailed token', async () => {
      const sendVerification = jest.spyOn(ctx.container.services.email, 'sendVerificationEmail');
      await request(ctx.app).post('/api/auth/register').send(registration).expect(201);
      const token = sendVerification.mock.calls[0][2];

      const res = await request(ctx.app).post('/api/auth/verify-email').send({ token });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Email verified successfully' });
      const stored = await ctx.container.repositories.users.findUserByUsername('dana');
      expect(stored?.isEmailVerified).toBe(true);

      const again = await request(ctx.app).post('/api/auth/verify-email').send({ token });
      expect(again.status).toBe(400);
      expect(again.body.message).toBe('Invalid or expired token');
      sendVerification.mockRestore();
    });
  });

  describe('POST /api/auth/login', () => {
    it('logs in by username or email and returns the profile', async () => {
      const { user } = await createUser(ctx, 'erin');

      const byName = await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'erin', password: TEST_PASSWORD });
      const byEmail = await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'erin@example.com', password: TEST_PASSWORD });

      expect(byName.status).toBe(200);
      expect(byEmail.status).toBe(200);
      expect(typeof byName.body.accessToken).toBe('string');
      expect(typeof byName.body.refreshToken).toBe('string');
      expect(byName.body.user).toMatchObject({
        id: user.id,
        username: 'erin',
        fullName: 'Erin Tester',
        followersCount: 0,
        followingCount: 0,
        postsCount: 0,
        isFollowing: false,
      });
      expect(byName.body.user.lastLogin).not.toBeNull();
    });

    it('rejects a wrong password', async () => {
      await createUser(ctx, 'erin');

      const res = await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'erin', password: 'wrong-pass' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid credentials.');
    });

    it('rejects deactivated accounts', async () => {
      const { user } = await createUser(ctx, 'erin');
      await ctx.container.repositories.users.updateUser(user.id, { isDeactivated: true });

      const res = await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'erin', password: TEST_PASSWORD });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('User account is disabled.');
    });

    it('requires both fields', async () => {
      const res = await request(ctx.app).post('/api/auth/login').send({});

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual({
        emailOrUsername: ['emailOrUsername is required.'],
        password: ['password is required.'],
      });
    });
  });

  describe('token refresh and logout', () => {
    const login = async () => {
      await createUser(ctx, 'frank');
      const res = await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'frank', password: TEST_PASSWORD });
      return { access: `Bearer ${res.body.accessToken}`, refreshToken: String(res.body.refreshToken) };
    };

    it('issues a new access token for a refresh token', async () => {
      const { refreshToken } = await login();

      const res = await request(ctx.app).post('/api/auth/token/refresh').send({ refreshToken });

      expect(res.status).toBe(200);
      expect(typeof res.body.accessToken).toBe('string');
      await request(ctx.app).get('/api/users/me').set('Authorization', `Bearer ${res.body.accessToken}`).expect(200);
    });

    it('does not accept an access token as a refresh token', async () => {
      const { access } = await login();

      const res = await request(ctx.app).post('/api/auth/token/refresh').send({ refreshToken: access.slice('Bearer '.length) });

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('Token is invalid or expired');
    });

    it('revokes the refresh token on logout', async () => {
      const { access, refreshToken } = await login();

      const res = await request(ctx.app).post('/api/auth/logout').set('Authorization', access).send({ refreshToken });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Successfully logged out' });
      const refresh = await request(ctx.app).post('/api/auth/token/refresh').send({ refreshToken });
      expect(refresh.status).toBe(401);
    });

    it('refuses to revoke an unreadable token', async () => {
      const { access } = await login();

      const res = await request(ctx.app).post('/api/auth/logout').set('Authorization', access).send({ refreshToken: 'garbage' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid token' });
    });

    it('requires authentication to log out', async () => {
      const res = await request(ctx.app).post('/api/auth/logout').send({});

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('Unauthorized: Access token is required.');
    });
  });

  describe('passwords', () => {
    it('changes the password after checking the old one', async () => {
      const { auth } = await createUser(ctx, 'gina');

      const wrong = await request(ctx.app).post('/api/auth/password/change').set('Authorization', auth).send({
        oldPassword: 'not-it-at-all',
        newPassword: 'Fresh-pass-2',
        newPasswordConfirm: 'Fresh-pass-2',
      });
      expect(wrong.status).toBe(400);
      expect(wrong.body.errors).toEqual({ oldPassword: ['Old password is incorrect.'] });

      const res = await request(ctx.app).post('/api/auth/password/change').set('Authorization', auth).send({
        oldPassword: TEST_PASSWORD,
        newPassword: 'Fresh-pass-2',
        newPasswordConfirm: 'Fresh-pass-2',
      });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Password changed successfully' });

      await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'gina', password: 'Fresh-pass-2' }).expect(200);
    });

    it('resets a forgotten password with the emailed token', async () => {
      await createUser(ctx, 'hank');
      const sendReset = jest.spyOn(ctx.container.services.email, 'sendPasswordResetEmail');

      const requested = await request(ctx.app).post('/api/auth/password/reset').send({ email: 'hank@example.com' });
      expect(requested.status).toBe(200);
      expect(requested.body).toEqual({ message: 'Password reset email sent' });
      const token = sendReset.mock.calls[0][2];

      const res = await request(ctx.app).post('/api/auth/password/reset/confirm').send({
        token,
        newPassword: 'Brand-new-9',
        newPasswordConfirm: 'Brand-new-9',
      });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Password reset successfully' });

      await request(ctx.app).post('/api/auth/login').send({ emailOrUsername: 'hank', password: 'Brand-new-9' }).expect(200);
      const reused = await request(ctx.app).post('/api/auth/password/reset/confirm').send({
        token,
        newPassword: 'Brand-new-9',
        newPasswordConfirm: 'Brand-new-9',
      });
      expect(reused.status).toBe(400);
      sendReset.mockRestore();
    });

    it('answers the same for unknown emails', async () => {
      const sendReset = jest.spyOn(ctx.container.services.email, 'sendPasswordResetEmail');

      const res = await request(ctx.app).post('/api/auth/password/reset').send({ email: 'nobody@example.com' });

      expect(res.status).toBe(200);
      expect(sendReset).not.toHaveBeenCalled();
      sendReset.mockRestore();
    });
  });
});
