/**
 * HTTP boundary for the session operations
 *
 *   POST /api/auth/register/initial   pre-register, mails the activation secret
 *   POST /api/auth/register/complete  activate
 *   POST /api/auth/login              access token in the body, refresh token as cookie
 *   GET  /api/auth/refresh            new access token from the refresh cookie
 *   GET  /api/restricted/user/me      the caller's account (Bearer access token)
 *   GET  /health
 *
 * Login and refresh failures are collapsed into one `invalid_credentials`
 * response so a client cannot tell a missing account from a wrong password.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import { createServer, type Server } from 'http';
import type { SessionOrchestrator } from '../core/session-orchestrator.js';
import { DEFAULT_REFRESH_TTL_SECONDS } from '../core/credential-engine.js';
import { createErrorResponse, InvalidTokenError, sanitizeError } from '../utils/errors.js';
import { getAuthenticatedAccountId, requireAccessToken } from './middleware.js';
import { ActivationBodySchema, CredentialsBodySchema, parseBody } from './request-schemas.js';

export const REFRESH_COOKIE_NAME = 'refresh-token';
export const REFRESH_COOKIE_PATH = '/api/auth';

export interface AuthServerOptions {
  /** Lifetime of the refresh cookie; match the refresh credential TTL */
  refreshTtlSeconds?: number;

  /** Mark the refresh cookie Secure (default: true) */
  secureCookies?: boolean;

  /** Browser origin allowed to call the API with credentials */
  allowedOrigin?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections to the error handler; express 4 does not.
 */
function route(handler: AsyncHandler, options: { collapseCredentialFailures?: boolean } = {}) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (options.collapseCredentialFailures) {
      res.locals.collapseCredentialFailures = true;
    }
    handler(req, res).catch(next);
  };
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export function createAuthServer(
  orchestrator: SessionOrchestrator,
  options: AuthServerOptions = {}
): express.Application {
  const app = express();
  const refreshTtlSeconds = options.refreshTtlSeconds ?? DEFAULT_REFRESH_TTL_SECONDS;
  const secureCookies = options.secureCookies ?? true;

  app.use(express.json());
  app.use(cookieParser());

  if (options.allowedOrigin) {
    const allowedOrigin = options.allowedOrigin;
    app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', allowedOrigin);
      res.header('Access-Control-Allow-Credentials', 'true');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      res.header('Access-Control-Expose-Headers', 'WWW-Authenticate');

      if (req.method === 'OPTIONS') {
        res.sendStatus(204);
        return;
      }
      next();
    });
  }

  const auth = express.Router();

  auth.post(
    '/register/initial',
    route(async (req, res) => {
      const { email, password } = parseBody(CredentialsBodySchema, req.body);
      await orchestrator.preRegister(email, password);
      res.json({ message: 'ok' });
    })
  );

  auth.post(
    '/register/complete',
    route(async (req, res) => {
      const { email, token } = parseBody(ActivationBodySchema, req.body);
      await orchestrator.activate(email, token);
      res.json({ message: 'activate ok' });
    })
  );

  auth.post(
    '/login',
    route(
      async (req, res) => {
        const { email, password } = parseBody(CredentialsBodySchema, req.body);
        const result = await orchestrator.login(email, password);

        res.cookie(REFRESH_COOKIE_NAME, result.refreshToken, {
          httpOnly: true,
          sameSite: 'strict',
          secure: secureCookies,
          path: REFRESH_COOKIE_PATH,
          maxAge: refreshTtlSeconds * 1000,
        });
        res.json({ access_token: result.accessToken });
      },
      { collapseCredentialFailures: true }
    )
  );

  auth.get(
    '/refresh',
    route(
      async (req, res) => {
        const cookie: unknown = req.cookies?.[REFRESH_COOKIE_NAME];
        if (typeof cookie !== 'string' || cookie.length === 0) {
          throw new InvalidTokenError('Missing refresh token cookie');
        }
        const result = await orchestrator.refresh(cookie);
        res.json({ access_token: result.accessToken });
      },
      { collapseCredentialFailures: true }
    )
  );

  const restricted = express.Router();
  restricted.use(requireAccessToken(orchestrator));

  restricted.get(
    '/user/me',
    route(async (_req, res) => {
      const account = await orchestrator.getAccount(getAuthenticatedAccountId(res));
      res.json({
        id: account.id,
        email: account.email,
        updated_at: account.updatedAt,
        created_at: account.createdAt,
      });
    })
  );

  app.use('/api/auth', auth);
  app.use('/api/restricted', restricted);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'credential-lifecycle',
      timestamp: new Date().toISOString(),
    });
  });

  // Error handler (four arguments: express identifies error middleware by arity)
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({
        error: 'invalid_request',
        error_description: 'Request body is not valid JSON',
      });
      return;
    }

    const { statusCode, body } = createErrorResponse(err, {
      collapseCredentialFailures: res.locals.collapseCredentialFailures === true,
    });

    if (statusCode >= 500) {
      console.error(`[HTTP Server] ${req.method} ${req.path} failed:`, sanitizeError(err));
    }

    res.status(statusCode).json(body);
  });

  return app;
}

/**
 * Start listening; rejects with a readable error when the port is taken.
 */
export function startHTTPServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[HTTP Server] Listening on port ${port}`);
      resolve(server);
    });
  });
}
