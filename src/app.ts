/**
 * Express application factory with dependency injection.
 *
 * Creates a configured Express app with middleware wired in order:
 * 1. Request correlation id
 * 2. JSON body parser
 * 3. Challenge routes under `/api/auth`, with per-IP rate limiting on
 *    OTP issuance and verification
 * 4. Global error handling
 *
 * The factory accepts every dependency so tests can compose the app from
 * in-memory stores and a stub Redis.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';

import {
  checkLimit,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_WINDOW_SECONDS,
  otpIssueKey,
  otpVerifyKey,
  type RateLimitRedis,
} from './middleware/rateLimiter.js';
import {
  formatErrorResponse,
  formatThrownError,
  generateRequestId,
  getHttpStatusForError,
} from './utils/responses.js';
import { CHALLENGE_ERROR_CODES, type ErrorResponse } from './types/index.js';
import { silentLogger, type Logger } from './logging/logger.js';
import {
  cancelPendingPushAuth,
  consumePasskeyChallenge,
  createPushAuthRequest,
  issueOtp,
  issuePasskeyChallenge,
  listAuthMethods,
  pollPushAuthStatus,
  registerAuthMethod,
  respondPushAuth,
  setAuthMethodEnabled,
  verifyOtp,
  type ChallengeDependencies,
  type RequestContext,
} from './controllers/challengeController.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

export interface IpRateLimit {
  maxAttempts: number;
  windowSeconds: number;
}

/** All dependencies required to create the Express application. */
export interface AppDependencies {
  challenges: ChallengeDependencies;

  /** Redis client for per-IP rate limiting. */
  redis: RateLimitRedis;

  logger?: Logger;

  /** Per-IP limits; both default to 10 requests per 15 minutes. */
  rateLimits?: {
    otpIssue?: IpRateLimit;
    otpVerify?: IpRateLimit;
  };
}

/** Header carrying the user authenticated by the upstream gateway. */
export const ACTOR_HEADER = 'x-user-id';
export const REQUEST_ID_HEADER = 'x-request-id';

const DEFAULT_IP_LIMIT: IpRateLimit = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  windowSeconds: DEFAULT_WINDOW_SECONDS,
};

// ─── Helpers ─────────────────────────────────────────────────────────────────

type HandlerResult = { success: true } | ErrorResponse;

function clientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

function requestIdOf(res: Response): string {
  const header = res.getHeader(REQUEST_ID_HEADER);
  return typeof header === 'string' ? header : generateRequestId();
}

/** Extract request context (correlation id, IP, user agent, actor) from an Express request. */
function getRequestContext(req: Request, res: Response): RequestContext {
  return {
    requestId: requestIdOf(res),
    ipAddress: clientIp(req),
    userAgent: req.get('user-agent') ?? null,
    actorId: req.get(ACTOR_HEADER)?.trim() || null,
  };
}

/** Run a controller and send its result with the status its error code implies. */
function handle(
  successStatus: number,
  run: (req: Request, ctx: RequestContext) => Promise<HandlerResult>,
) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await run(req, getRequestContext(req, res));
      const status = result.success ? successStatus : getHttpStatusForError(result.error.code);
      res.status(status).json(result);
    } catch (err) {
      next(err);
    }
  };
}

// ─── Rate Limit Middleware Factory ───────────────────────────────────────────

/**
 * Create an Express middleware that applies rate limiting using the given
 * key builder function. Returns 429 with Retry-After header when exceeded.
 */
function rateLimitMiddleware(
  redis: RateLimitRedis,
  keyBuilder: (ip: string) => string,
  limit: IpRateLimit,
) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const now = Date.now();
      const result = await checkLimit(
        redis,
        keyBuilder(clientIp(req)),
        limit.maxAttempts,
        limit.windowSeconds,
        now,
      );
      if (result.allowed) {
        next();
        return;
      }

      const retryAfterSeconds = Math.max(1, Math.ceil((result.resetAt.getTime() - now) / 1000));
      res.set('Retry-After', String(retryAfterSeconds));
      res
        .status(429)
        .json(
          formatErrorResponse(
            CHALLENGE_ERROR_CODES.RATE_LIMITED,
            'Too many attempts. Please try again later.',
            requestIdOf(res),
            { retryAfterSeconds },
          ),
        );
    } catch (err) {
      next(err);
    }
  };
}

// ─── Application Factory ────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const logger = (deps.logger ?? silentLogger).child({ component: 'http' });
  const { challenges } = deps;

  // ── Global Middleware (order matters) ──────────────────────────────────

  app.disable('x-powered-by');

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader(REQUEST_ID_HEADER, req.get(REQUEST_ID_HEADER) || generateRequestId());
    next();
  });

  app.use(express.json({ limit: '16kb' }));

  // ── Challenge Routes ───────────────────────────────────────────────────

  const router = express.Router();

  const otpIssueLimit = rateLimitMiddleware(
    deps.redis,
    otpIssueKey,
    deps.rateLimits?.otpIssue ?? DEFAULT_IP_LIMIT,
  );
  const otpVerifyLimit = rateLimitMiddleware(
    deps.redis,
    otpVerifyKey,
    deps.rateLimits?.otpVerify ?? DEFAULT_IP_LIMIT,
  );

  router.post(
    '/otp',
    otpIssueLimit,
    handle(201, (req, ctx) => issueOtp(req.body, ctx, challenges)),
  );

  router.post(
    '/otp/:sessionId/verify',
    otpVerifyLimit,
    handle(200, (req, ctx) => verifyOtp(req.params['sessionId'] ?? '', req.body, ctx, challenges)),
  );

  router.post(
    '/passkey/challenges',
    handle(201, (req, ctx) => issuePasskeyChallenge(req.body, ctx, challenges)),
  );

  router.post(
    '/passkey/challenges/:challengeId/consume',
    handle(200, (req, ctx) =>
      consumePasskeyChallenge(req.params['challengeId'] ?? '', req.body, ctx, challenges),
    ),
  );

  router.post(
    '/push',
    handle(201, (req, ctx) => createPushAuthRequest(req.body, ctx, challenges)),
  );

  // Registered before '/push/:requestId' routes so it is not taken for an id.
  router.post(
    '/push/cancel-pending',
    handle(200, (_req, ctx) => cancelPendingPushAuth(ctx, challenges)),
  );

  router.post(
    '/push/:requestId/respond',
    handle(200, (req, ctx) => respondPushAuth(req.params['requestId'] ?? '', req.body, ctx, challenges)),
  );

  router.get(
    '/push/:requestId',
    handle(200, (req, ctx) => pollPushAuthStatus(req.params['requestId'] ?? '', ctx, challenges)),
  );

  router.post(
    '/methods',
    handle(201, (req, ctx) => registerAuthMethod(req.body, ctx, challenges)),
  );

  router.get(
    '/methods',
    handle(200, (req, ctx) => listAuthMethods(req.query['userId'], ctx, challenges)),
  );

  router.patch(
    '/methods/:methodId',
    handle(200, (req, ctx) =>
      setAuthMethodEnabled(req.params['methodId'] ?? '', req.body, ctx, challenges),
    ),
  );

  app.use('/api/auth', router);

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = requestIdOf(res);

    if (err instanceof SyntaxError && 'body' in err) {
      res
        .status(400)
        .json(
          formatErrorResponse(CHALLENGE_ERROR_CODES.INVALID_REQUEST, 'Malformed JSON body.', requestId),
        );
      return;
    }

    const { status, body } = formatThrownError(err, requestId);
    if (status >= 500) {
      logger.error('Request failed', err, { requestId, method: req.method, path: req.path });
    } else {
      logger.warn('Request rejected', { requestId, code: body.error.code, path: req.path });
    }
    if (body.error.retryAfterSeconds !== undefined) {
      res.set('Retry-After', String(body.error.retryAfterSeconds));
    }
    res.status(status).json(body);
  });

  return app;
}
