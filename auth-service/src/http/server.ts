/**
 * HTTP Adapter
 *
 * A dispatcher over the service layer on node:http. `dispatch` is pure
 * request-in/response-out so it can be driven without a socket;
 * `createAuthServer` only reads the body and writes the result.
 *
 * Per request: route match → rate limit (client IP, endpoint class) →
 * admission permit → handler. `/health` and the JWKS document bypass both.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { type } from 'arktype';
import {
  AdmissionError,
  extractToken,
  generateCorrelationId,
  logger,
  normalizeError,
  ServiceError,
  validateInput,
  withCorrelationId,
  type AdmissionController,
  type TokenCodec,
} from 'core-service';
import { AUTH_ERRORS, AUTH_ERROR_STATUS, isAuthErrorCode } from '../error-codes.js';
import type { CredentialVerifier } from '../services/credential-verifier.js';
import type { RateLimiter } from '../services/rate-limiter.js';
import type { RoleService } from '../services/role-service.js';
import type { SessionService } from '../services/session-service.js';
import type { AuthenticatedPrincipal, EndpointClass, TokenPair } from '../types.js';

// ═══════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════

export interface HttpRequest {
  method: string;
  path: string;
  headers: Record<string, string | undefined>;
  /** Raw body text; empty when the request had none */
  body: string;
  ipAddress: string;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body?: unknown;
}

export type HealthProbe = () => Promise<{ healthy: boolean; latencyMs: number }>;

export interface AuthHttpDeps {
  serviceName: string;
  sessions: SessionService;
  roles: RoleService;
  rateLimiter: RateLimiter;
  admission: AdmissionController;
  verifier: CredentialVerifier;
  codec: TokenCodec;
  /** Store probes reported by /health, e.g. { database, redis } */
  healthChecks: Record<string, HealthProbe>;
}

interface RouteContext {
  request: HttpRequest;
  params: string[];
}

interface Route {
  method: string;
  pattern: RegExp;
  endpoint: EndpointClass;
  handle: (ctx: RouteContext) => Promise<HttpResponse>;
}

/** Queue waits above this are reported in X-Queue-Wait-Time */
const QUEUE_WAIT_REPORT_MS = 100;
const MAX_BODY_BYTES = 64 * 1024;

// ═══════════════════════════════════════════════════════════════════
// Request Schemas
// ═══════════════════════════════════════════════════════════════════

const loginBody = type({
  email: 'string.email',
  password: 'string > 0',
  'device_info?': 'string',
});

const refreshBody = type({
  refresh_token: 'string > 0',
});

const logoutBody = type({
  'refresh_token?': 'string > 0',
});

function parseJson(raw: string): unknown {
  if (raw.trim() === '') return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new ServiceError(AUTH_ERRORS.ValidationFailed, 'Request body is not valid JSON');
  }
}

function validated<T extends object>(schemaResult: T | InstanceType<typeof type.errors>): T {
  const result = validateInput(schemaResult);
  if ('errors' in result) {
    throw new ServiceError(AUTH_ERRORS.ValidationFailed, result.errors.join('; '));
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════
// Responses
// ═══════════════════════════════════════════════════════════════════

function json(status: number, body: unknown): HttpResponse {
  return { status, headers: { 'Content-Type': 'application/json' }, body };
}

function noContent(): HttpResponse {
  return { status: 204, headers: {} };
}

function tokenResponse(pair: TokenPair): HttpResponse {
  return json(200, {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: pair.tokenType,
    expires_in: pair.expiresIn,
  });
}

function errorResponse(status: number, code: string, message: string, retryAfter?: number): HttpResponse {
  const response = json(status, {
    success: false,
    error: retryAfter === undefined ? { code, message } : { code, message, retryAfter },
  });
  if (retryAfter !== undefined) {
    response.headers['Retry-After'] = String(retryAfter);
  }
  return response;
}

/**
 * Map any thrown value to a response. Business failures keep their code
 * and message; anything unclassified becomes an opaque InternalError.
 */
export function toErrorResponse(error: unknown, request?: Pick<HttpRequest, 'method' | 'path'>): HttpResponse {
  if (error instanceof AdmissionError) {
    const code = error.reason === 'Overloaded' ? AUTH_ERRORS.Overloaded : AUTH_ERRORS.QueueTimeout;
    return errorResponse(AUTH_ERROR_STATUS[code], code, error.message, error.retryAfter);
  }

  if (error instanceof ServiceError && isAuthErrorCode(error.code)) {
    const response = errorResponse(AUTH_ERROR_STATUS[error.code], error.code, error.message, error.retryAfter);
    if (error.code === AUTH_ERRORS.RateLimited && typeof error.details.limit === 'number') {
      response.headers['X-RateLimit-Limit'] = String(error.details.limit);
      response.headers['X-RateLimit-Remaining'] = '0';
    }
    return response;
  }

  logger.error('Unhandled request error', { ...normalizeError(error), method: request?.method, path: request?.path });
  return errorResponse(AUTH_ERROR_STATUS[AUTH_ERRORS.InternalError], AUTH_ERRORS.InternalError, 'Internal server error');
}

// ═══════════════════════════════════════════════════════════════════
// Dispatcher
// ═══════════════════════════════════════════════════════════════════

export class AuthHttpHandler {
  private readonly routes: Route[];
  private readonly startTime = Date.now();

  constructor(private readonly deps: AuthHttpDeps) {
    this.routes = this.buildRoutes();
  }

  async dispatch(request: HttpRequest): Promise<HttpResponse> {
    try {
      if (request.path === '/health') {
        return await this.health();
      }
      if (request.path === '/.well-known/jwks.json' && request.method === 'GET') {
        return json(200, this.deps.codec.getJwks());
      }

      const match = this.match(request);
      const decision = await this.deps.rateLimiter.enforce(request.ipAddress, match.route.endpoint);
      const permit = await this.deps.admission.acquire();

      let response: HttpResponse;
      try {
        response = await match.route.handle({ request, params: match.params });
      } finally {
        permit.release();
      }

      response.headers['X-RateLimit-Limit'] = String(decision.limit);
      response.headers['X-RateLimit-Remaining'] = String(decision.remaining);
      if (permit.waitedMs > QUEUE_WAIT_REPORT_MS) {
        response.headers['X-Queue-Wait-Time'] = `${permit.waitedMs}ms`;
      }
      return response;
    } catch (error) {
      return toErrorResponse(error, request);
    }
  }

  private match(request: HttpRequest): { route: Route; params: string[] } {
    let pathMatched = false;

    for (const route of this.routes) {
      const result = route.pattern.exec(request.path);
      if (!result) continue;
      pathMatched = true;
      if (route.method !== request.method) continue;

      try {
        return { route, params: result.slice(1).map(decodeURIComponent) };
      } catch {
        throw new ServiceError(AUTH_ERRORS.ValidationFailed, 'Malformed path parameter');
      }
    }

    if (pathMatched) {
      throw new ServiceError(AUTH_ERRORS.MethodNotAllowed, `Method ${request.method} not allowed`);
    }
    throw new ServiceError(AUTH_ERRORS.NotFound, 'Not found');
  }

  private authenticate(request: HttpRequest): Promise<AuthenticatedPrincipal> {
    const token = extractToken(request.headers.authorization);
    if (!token) {
      throw new ServiceError(AUTH_ERRORS.MissingToken, 'Bearer access token required');
    }
    return this.deps.sessions.authenticate(token);
  }

  // ─────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────

  private buildRoutes(): Route[] {
    const { sessions, roles } = this.deps;

    return [
      {
        method: 'POST',
        pattern: /^\/auth\/login$/,
        endpoint: 'login',
        handle: async ({ request }) => {
          const body = validated(loginBody(parseJson(request.body)));
          const pair = await sessions.login({
            email: body.email,
            password: body.password,
            deviceInfo: body.device_info,
            ipAddress: request.ipAddress,
            userAgent: request.headers['user-agent'],
          });
          return tokenResponse(pair);
        },
      },
      {
        method: 'POST',
        pattern: /^\/auth\/refresh$/,
        endpoint: 'refresh',
        handle: async ({ request }) => {
          const body = validated(refreshBody(parseJson(request.body)));
          return tokenResponse(await sessions.refresh(body.refresh_token));
        },
      },
      {
        method: 'POST',
        pattern: /^\/auth\/logout$/,
        endpoint: 'logout',
        handle: async ({ request }) => {
          const token = extractToken(request.headers.authorization);
          if (!token) {
            throw new ServiceError(AUTH_ERRORS.MissingToken, 'Bearer access token required');
          }
          const body = validated(logoutBody(parseJson(request.body)));
          await sessions.logout(token, body.refresh_token);
          return noContent();
        },
      },
      {
        method: 'GET',
        pattern: /^\/auth\/sessions$/,
        endpoint: 'default',
        handle: async ({ request }) => {
          const principal = await this.authenticate(request);
          const list = await sessions.listSessions(principal.subjectId);
          return json(200, {
            sessions: list.map(session => ({
              id: session.id,
              device_info: session.deviceInfo,
              created_at: session.createdAt.toISOString(),
              expires_at: session.expiresAt.toISOString(),
            })),
          });
        },
      },
      {
        method: 'DELETE',
        pattern: /^\/auth\/sessions$/,
        endpoint: 'default',
        handle: async ({ request }) => {
          const principal = await this.authenticate(request);
          const result = await sessions.revokeAll(principal.subjectId, { ipAddress: request.ipAddress });
          return json(200, {
            success: true,
            refresh_tokens_revoked: result.refreshTokensRevoked,
            access_tokens_revoked: result.accessTokensRevoked,
          });
        },
      },
      {
        method: 'PUT',
        pattern: /^\/admin\/subjects\/([^/]+)\/roles\/([^/]+)$/,
        endpoint: 'default',
        handle: async ({ request, params }) => {
          const principal = await this.authenticate(request);
          await sessions.authorize(principal, 'roles:assign');
          await roles.assignRole({ subjectId: params[0], role: params[1] });
          return noContent();
        },
      },
      {
        method: 'DELETE',
        pattern: /^\/admin\/subjects\/([^/]+)\/roles\/([^/]+)$/,
        endpoint: 'default',
        handle: async ({ request, params }) => {
          const principal = await this.authenticate(request);
          await sessions.authorize(principal, 'roles:assign');
          const removed = await roles.unassignRole(params[0], params[1]);
          return json(200, { success: true, removed });
        },
      },
      {
        method: 'DELETE',
        pattern: /^\/admin\/subjects\/([^/]+)\/sessions$/,
        endpoint: 'default',
        handle: async ({ request, params }) => {
          const principal = await this.authenticate(request);
          await sessions.authorize(principal, 'sessions:revoke');
          const result = await sessions.revokeAll(params[0], { ipAddress: request.ipAddress, reason: 'admin' });
          return json(200, {
            success: true,
            refresh_tokens_revoked: result.refreshTokensRevoked,
            access_tokens_revoked: result.accessTokensRevoked,
          });
        },
      },
    ];
  }

  // ─────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────

  private async health(): Promise<HttpResponse> {
    const checks: Record<string, { healthy: boolean; latencyMs: number }> = {};
    for (const [name, probe] of Object.entries(this.deps.healthChecks)) {
      checks[name] = await probe();
    }

    const healthy = Object.values(checks).every(check => check.healthy);
    const admission = this.deps.admission.getHealthStatus();

    return json(healthy ? 200 : 503, {
      status: healthy ? 'healthy' : 'degraded',
      service: this.deps.serviceName,
      uptime: (Date.now() - this.startTime) / 1000,
      timestamp: new Date().toISOString(),
      checks,
      admission: { ...admission, ...this.deps.admission.getMetrics() },
      passwordHashing: this.deps.verifier.getMetrics(),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════
// node:http Binding
// ═══════════════════════════════════════════════════════════════════

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    let size = 0;
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      size += Buffer.byteLength(chunk);
      if (size > MAX_BODY_BYTES) {
        reject(new ServiceError(AUTH_ERRORS.ValidationFailed, 'Request body too large'));
        req.destroy();
        return;
      }
      body += chunk;
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function writeResponse(res: ServerResponse, response: HttpResponse, correlationId: string): void {
  const headers = { ...response.headers, 'X-Correlation-ID': correlationId };
  res.writeHead(response.status, headers);
  res.end(response.body === undefined ? undefined : JSON.stringify(response.body));
}

export function createAuthServer(handler: AuthHttpHandler): Server {
  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const correlationId =
      headerValue(req.headers['x-correlation-id']) || headerValue(req.headers['x-request-id']) || generateCorrelationId();

    await withCorrelationId(correlationId, async () => {
      const started = Date.now();
      const method = req.method || 'GET';
      let response: HttpResponse;

      try {
        const headers: Record<string, string | undefined> = {};
        for (const [name, value] of Object.entries(req.headers)) {
          headers[name] = headerValue(value);
        }
        response = await handler.dispatch({
          method,
          path: url.pathname,
          headers,
          body: await readBody(req),
          ipAddress: req.socket.remoteAddress || 'unknown',
        });
      } catch (error) {
        response = toErrorResponse(error, { method, path: url.pathname });
      }

      writeResponse(res, response, correlationId);
      logger.debug('Request completed', {
        method,
        path: url.pathname,
        status: response.status,
        durationMs: Date.now() - started,
      });
    });
  }

  return createServer((req, res) => {
    handleRequest(req, res).catch(error => {
      logger.error('Failed to write response', normalizeError(error));
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });
}
