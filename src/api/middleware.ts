import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { logger } from '../utils/logger.js';
import { AppError, UnauthenticatedError, ValidationError } from '../utils/errors.js';

export const CUSTOMER_ID_HEADER = 'x-customer-id';
export const TECHNICIAN_ID_HEADER = 'x-technician-id';

/**
 * Request carrying identity asserted by the upstream gateway or API key
 */
export interface AuthenticatedRequest extends Request {
  customerId?: string;
  technicianId?: string;
  adminName?: string;
}

function clientAddress(req: Request): string {
  // Use X-Forwarded-For for proxied requests, fall back to IP
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    return forwarded.split(',')[0]?.trim() ?? 'unknown';
  }
  return req.ip ?? 'unknown';
}

export interface RateLimiters {
  public: RateLimitRequestHandler;
  admin: RateLimitRequestHandler;
}

/**
 * Rate limiters are created per app so each instance keeps its own counters
 */
export function createRateLimiters(): RateLimiters {
  return {
    // 100 requests per minute per IP
    public: rateLimit({
      windowMs: 60 * 1000,
      max: 100,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'RATE_LIMITED', message: 'Too many requests, please try again later' },
      keyGenerator: (req) => `public:${clientAddress(req)}`,
    }),
    // 30 requests per minute per API key
    admin: rateLimit({
      windowMs: 60 * 1000,
      max: 30,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'RATE_LIMITED', message: 'Too many admin requests, please try again later' },
      keyGenerator: (req) => {
        const apiKey = req.headers['x-api-key'];
        if (typeof apiKey === 'string') {
          return `admin:${apiKey}`;
        }
        return `admin:${clientAddress(req)}`;
      },
    }),
  };
}

/**
 * API key authentication for staff endpoints. Keys map to the staff name
 * recorded as processed_by on the actions they take.
 */
export function requireApiKey(adminApiKeys: ReadonlyMap<string, string>) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const apiKey = req.headers['x-api-key'];

    if (!apiKey || typeof apiKey !== 'string') {
      res.status(401).json({ error: 'UNAUTHENTICATED', message: 'API key required' });
      return;
    }

    const adminName = adminApiKeys.get(apiKey);
    if (!adminName) {
      logger.warn({ apiKeyPrefix: apiKey.substring(0, 4) + '...' }, 'Invalid API key attempt');
      res.status(403).json({ error: 'FORBIDDEN', message: 'Invalid API key' });
      return;
    }

    req.adminName = adminName;
    next();
  };
}

function headerValue(req: Request, header: string): string | null {
  const value = req.headers[header];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function requireCustomer(req: AuthenticatedRequest, _res: Response, next: NextFunction): void {
  const customerId = headerValue(req, CUSTOMER_ID_HEADER);
  if (!customerId) {
    next(new UnauthenticatedError('X-Customer-Id header required'));
    return;
  }
  req.customerId = customerId;
  next();
}

export function requireTechnician(req: AuthenticatedRequest, _res: Response, next: NextFunction): void {
  const technicianId = headerValue(req, TECHNICIAN_ID_HEADER);
  if (!technicianId) {
    next(new UnauthenticatedError('X-Technician-Id header required'));
    return;
  }
  req.technicianId = technicianId;
  next();
}

export function customerIdOf(req: AuthenticatedRequest): string {
  if (!req.customerId) {
    throw new UnauthenticatedError('X-Customer-Id header required');
  }
  return req.customerId;
}

export function technicianIdOf(req: AuthenticatedRequest): string {
  if (!req.technicianId) {
    throw new UnauthenticatedError('X-Technician-Id header required');
  }
  return req.technicianId;
}

export function routeParam(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) {
    throw new ValidationError(`Missing route parameter: ${name}`, name);
  }
  return value;
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof AppError) {
    const level = err.statusCode >= 500 ? 'error' : 'warn';
    logger[level](
      { requestId: req.id, code: err.code, error: err.message, path: req.path, method: req.method },
      'Request failed'
    );
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
    return;
  }

  logger.error(
    {
      requestId: req.id,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method,
    },
    'Unhandled request error'
  );

  // Generic error response (don't leak internal details)
  res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
};

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'NOT_FOUND', message: 'Route not found' });
}

/**
 * Request id for correlation: honours an incoming X-Request-ID
 */
export function resolveRequestId(req: IncomingMessage, res: ServerResponse): string {
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID();
  res.setHeader('X-Request-ID', requestId);
  return requestId;
}
