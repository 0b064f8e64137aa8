/**
 * Unit tests for the Express application factory (src/app.ts).
 *
 * The app is composed from in-memory document stores and an in-process
 * Redis stand-in, so each test drives the real managers through HTTP:
 * - Route registration and delegation to controllers
 * - Per-IP rate limiting on OTP issuance and verification
 * - Error handling middleware catches unhandled errors
 * - HTTP status codes match response types
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp, type AppDependencies } from './app.js';
import { buildServices } from './bootstrap.js';
import { getChallengeConfig } from './config.js';
import type { RateLimitRedis } from './middleware/rateLimiter.js';
import type { EmailTransport, PushTransport, SmsTransport } from './services/notifier.js';
import { createFakeRedis } from './test/fakeRedis.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function createMockTransports() {
  return {
    sms: { sendSms: vi.fn<SmsTransport['sendSms']>().mockResolvedValue(undefined) },
    email: { sendMail: vi.fn<EmailTransport['sendMail']>().mockResolvedValue(undefined) },
    push: { sendPush: vi.fn<PushTransport['sendPush']>().mockResolvedValue(undefined) },
  };
}

type Transports = ReturnType<typeof createMockTransports>;

function buildApp(overrides: Partial<AppDependencies> = {}) {
  const transports = createMockTransports();
  const services = buildServices({
    config: getChallengeConfig({}),
    storeDriver: 'memory',
    transports,
  });
  const app = createApp({
    challenges: services.challenges,
    redis: createFakeRedis().redis,
    ...overrides,
  });
  return { app, transports };
}

/** The code from the most recent verification email. */
function lastEmailedCode(transports: Transports): string {
  const html = transports.email.sendMail.mock.calls.at(-1)?.[0].html ?? '';
  return /bold;">(\d+)<\/p>/.exec(html)?.[1] ?? '';
}

async function issueEmailOtp(app: Express, identifier = 'ada@example.com') {
  return request(app).post('/api/auth/otp').send({ identifier, purpose: 'AUTHENTICATION' });
}

// ─── OTP ─────────────────────────────────────────────────────────────────────

describe('OTP routes', () => {
  let app: Express;
  let transports: Transports;

  beforeEach(() => {
    ({ app, transports } = buildApp());
  });

  it('POST /api/auth/otp issues a session and emails the code', async () => {
    const res = await issueEmailOtp(app);

    expect(res.status).toBe(201);
    expect(res.body.success).toBe(true);
    expect(res.body.channel).toBe('EMAIL');
    expect(typeof res.body.sessionId).toBe('string');
    expect(transports.email.sendMail).toHaveBeenCalledOnce();
    expect(lastEmailedCode(transports)).toMatch(/^\d{6}$/);
  });

  it('rejects a body without identifier or purpose', async () => {
    const res = await request(app).post('/api/auth/otp').send({});

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'AUTH_INVALID_REQUEST',
      message: 'Invalid request',
      fields: {
        identifier: ['is required'],
        purpose: ['must be one of REGISTRATION, AUTHENTICATION'],
      },
    });
  });

  it('throttles a resend for the same identifier with Retry-After', async () => {
    await issueEmailOtp(app);
    const res = await issueEmailOtp(app);

    expect(res.status).toBe(429);
    expect(res.body.error.code).toBe('AUTH_RATE_LIMITED');
    expect(res.headers['retry-after']).toBe(String(res.body.error.retryAfterSeconds));
  });

  it('verifies the emailed code once and reports remaining attempts on a miss', async () => {
    const issued = await issueEmailOtp(app);
    const sessionId: string = issued.body.sessionId;
    const code = lastEmailedCode(transports);
    const wrong = code === '000000' ? '111111' : '000000';

    const miss = await request(app).post(`/api/auth/otp/${sessionId}/verify`).send({ code: wrong });
    expect(miss.status).toBe(401);
    expect(miss.body.error).toEqual({
      code: 'AUTH_CODE_INVALID',
      message: 'The code is incorrect.',
      remainingAttempts: 4,
    });

    const hit = await request(app).post(`/api/auth/otp/${sessionId}/verify`).send({ code });
    expect(hit.status).toBe(200);
    expect(hit.body).toMatchObject({
      success: true,
      sessionId,
      purpose: 'AUTHENTICATION',
      userId: null,
    });

    const again = await request(app).post(`/api/auth/otp/${sessionId}/verify`).send({ code });
    expect(again.status).toBe(409);
    expect(again.body.error.code).toBe('AUTH_ALREADY_CONSUMED');
  });

  it('answers an unknown session like an expired one', async () => {
    const res = await request(app).post('/api/auth/otp/no-such-session/verify').send({ code: '123456' });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'AUTH_CHALLENGE_INVALID',
      message: 'The challenge is invalid or has expired.',
    });
  });

  it('limits OTP issuance per client IP', async () => {
    ({ app } = buildApp({ rateLimits: { otpIssue: { maxAttempts: 2, windowSeconds: 60 } } }));

    await issueEmailOtp(app, 'one@example.com');
    await issueEmailOtp(app, 'two@example.com');
    const res = await issueEmailOtp(app, 'three@example.com');

    expect(res.status).toBe(429);
    expect(res.headers['retry-after']).toBe('60');
    expect(res.body.error).toEqual({
      code: 'AUTH_RATE_LIMITED',
      message: 'Too many attempts. Please try again later.',
      retryAfterSeconds: 60,
    });
  });
});

// ─── Passkey ─────────────────────────────────────────────────────────────────

describe('passkey routes', () => {
  it('issues a challenge that can be consumed exactly once', async () => {
    const { app } = buildApp();

    const issued = await request(app)
      .post('/api/auth/passkey/challenges')
      .send({ userId: 'user-1', type: 'AUTHENTICATION' });
    expect(issued.status).toBe(201);
    const challengeId: string = issued.body.challengeId;

    const consumed = await request(app)
      .post(`/api/auth/passkey/challenges/${challengeId}/consume`)
      .send({});
    expect(consumed.status).toBe(200);
    expect(consumed.body).toEqual({
      success: true,
      challengeId,
      type: 'AUTHENTICATION',
      userId: 'user-1',
      credentialId: null,
    });

    const replay = await request(app)
      .post(`/api/auth/passkey/challenges/${challengeId}/consume`)
      .send({});
    expect(replay.status).toBe(409);
    expect(replay.body.error.message).toBe('This challenge has already been used.');
  });
});

// ─── Push ────────────────────────────────────────────────────────────────────

describe('push routes', () => {
  let app: Express;
  let transports: Transports;

  beforeEach(() => {
    ({ app, transports } = buildApp());
  });

  async function createPush(): Promise<string> {
    const res = await request(app).post('/api/auth/push').send({ userId: 'user-1' });
    expect(res.status).toBe(201);
    return res.body.requestId;
  }

  it('pushes the request to the user', async () => {
    const requestId = await createPush();

    expect(transports.push.sendPush).toHaveBeenCalledOnce();
    expect(transports.push.sendPush.mock.calls[0]?.[0].data['requestId']).toBe(requestId);
  });

  it('requires an authenticated responder', async () => {
    const requestId = await createPush();
    const res = await request(app)
      .post(`/api/auth/push/${requestId}/respond`)
      .send({ decision: 'APPROVE' });

    expect(res.status).toBe(403);
    expect(res.body.error.message).toBe('An authenticated user is required.');
  });

  it('refuses a response from another user', async () => {
    const requestId = await createPush();
    const res = await request(app)
      .post(`/api/auth/push/${requestId}/respond`)
      .set('X-User-Id', 'user-2')
      .send({ decision: 'APPROVE' });

    expect(res.status).toBe(403);
    expect(res.body.error).toEqual({
      code: 'AUTH_FORBIDDEN',
      message: 'This request belongs to another user.',
    });
  });

  it('approves once, then reports the resolved status', async () => {
    const requestId = await createPush();

    const approved = await request(app)
      .post(`/api/auth/push/${requestId}/respond`)
      .set('X-User-Id', 'user-1')
      .send({ decision: 'APPROVE' });
    expect(approved.status).toBe(200);
    expect(approved.body.request.status).toBe('APPROVED');

    const denied = await request(app)
      .post(`/api/auth/push/${requestId}/respond`)
      .set('X-User-Id', 'user-1')
      .send({ decision: 'DENY' });
    expect(denied.status).toBe(409);
    expect(denied.body.error.code).toBe('AUTH_INVALID_TRANSITION');

    const polled = await request(app).get(`/api/auth/push/${requestId}`);
    expect(polled.status).toBe(200);
    expect(polled.body.request.status).toBe('APPROVED');
  });

  it('cancels every pending request of the caller', async () => {
    await createPush();
    await createPush();

    const res = await request(app).post('/api/auth/push/cancel-pending').set('X-User-Id', 'user-1');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, cancelled: 2 });
  });

  it('answers a poll for an unknown request as an invalid challenge', async () => {
    const res = await request(app).get('/api/auth/push/no-such-request');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('AUTH_CHALLENGE_INVALID');
  });
});

// ─── Authentication Methods ──────────────────────────────────────────────────

describe('authentication method routes', () => {
  let app: Express;

  beforeEach(() => {
    ({ app } = buildApp());
  });

  async function registerEmail(): Promise<string> {
    const res = await request(app)
      .post('/api/auth/methods')
      .set('X-User-Id', 'user-1')
      .send({ type: 'EMAIL_OTP', metadata: { emailAddress: 'ada@example.com' } });
    expect(res.status).toBe(201);
    return res.body.method.id;
  }

  it('registers a method for the caller and lists it', async () => {
    const methodId = await registerEmail();

    const res = await request(app).get('/api/auth/methods').query({ userId: 'user-1' });

    expect(res.status).toBe(200);
    expect(res.body.methods).toHaveLength(1);
    expect(res.body.methods[0]).toMatchObject({
      id: methodId,
      userId: 'user-1',
      type: 'EMAIL_OTP',
      enabled: true,
      maskedIdentifier: 'ad••@example.com',
      securityLevel: 'LOW',
      configured: false,
    });
  });

  it('rejects an unsupported method type', async () => {
    const res = await request(app)
      .post('/api/auth/methods')
      .set('X-User-Id', 'user-1')
      .send({ type: 'CARRIER_PIGEON', metadata: {} });

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ type: ['is not a supported method type'] });
  });

  it('refuses an OTP method enrolled as already verified', async () => {
    const res = await request(app)
      .post('/api/auth/methods')
      .set('X-User-Id', 'user-1')
      .send({ type: 'SMS_OTP', metadata: { phoneNumber: '+15551234567', verified: true } });

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ 'metadata.verified': ['is set only by verifying a code'] });

    const listed = await request(app).get('/api/auth/methods').query({ userId: 'user-1' });
    expect(listed.body.methods).toEqual([]);
  });

  it('enrolls an OTP method unverified when the flag is false', async () => {
    const res = await request(app)
      .post('/api/auth/methods')
      .set('X-User-Id', 'user-1')
      .send({ type: 'EMAIL_OTP', metadata: { emailAddress: 'ada@example.com', verified: false } });

    expect(res.status).toBe(201);
    expect(res.body.method.configured).toBe(false);
  });

  it('requires a userId to list methods', async () => {
    const res = await request(app).get('/api/auth/methods');

    expect(res.status).toBe(400);
    expect(res.body.error.fields).toEqual({ userId: ['is required'] });
  });

  it('lets only the owner disable a method', async () => {
    const methodId = await registerEmail();

    const foreign = await request(app)
      .patch(`/api/auth/methods/${methodId}`)
      .set('X-User-Id', 'user-2')
      .send({ enabled: false });
    expect(foreign.status).toBe(403);

    const own = await request(app)
      .patch(`/api/auth/methods/${methodId}`)
      .set('X-User-Id', 'user-1')
      .send({ enabled: false });
    expect(own.status).toBe(200);
    expect(own.body.method.enabled).toBe(false);
  });

  it('returns 404 for an unknown method', async () => {
    const res = await request(app)
      .patch('/api/auth/methods/no-such-method')
      .set('X-User-Id', 'user-1')
      .send({ enabled: true });

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({
      code: 'AUTH_NOT_FOUND',
      message: 'Authentication method not found.',
    });
  });
});

// ─── Cross-cutting ───────────────────────────────────────────────────────────

describe('request handling', () => {
  it('echoes the caller request id in headers and error bodies', async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post('/api/auth/otp/no-such-session/verify')
      .set('X-Request-Id', 'req-123')
      .send({ code: '123456' });

    expect(res.headers['x-request-id']).toBe('req-123');
    expect(res.body.requestId).toBe('req-123');
  });

  it('rejects malformed JSON with 400', async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post('/api/auth/otp')
      .set('Content-Type', 'application/json')
      .send('{"identifier":');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'AUTH_INVALID_REQUEST', message: 'Malformed JSON body.' });
  });

  it('turns an unexpected failure into a generic 500', async () => {
    const broken: RateLimitRedis = {
      ...createFakeRedis().redis,
      eval: vi.fn().mockRejectedValue(new Error('connection lost')),
    };
    const { app } = buildApp({ redis: broken });

    const res = await issueEmailOtp(app);

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred. Please try again later.',
    });
  });
});
