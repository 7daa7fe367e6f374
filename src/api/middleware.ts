import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { AppError, ValidationError } from '../errors';
import { sanitizeForLog } from '../utils/sanitize';

/**
 * Security headers for a JSON-only API
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    // Compare anyway so the length mismatch costs the same time
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Requires X-API-Key on the routes it guards when a key is configured
 */
export function createApiKeyAuth(apiKey: string | null): RequestHandler {
  return (req, res, next) => {
    if (!apiKey) {
      next();
      return;
    }

    const providedKey = req.header('X-API-Key');
    if (!providedKey) {
      res.status(401).json({ error: 'API key required. Provide X-API-Key header.' });
      return;
    }
    if (!safeEqual(providedKey, apiKey)) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}

export function createCorsMiddleware(origins: readonly string[]): RequestHandler {
  return cors({
    origin: origins.length > 0 ? [...origins] : false,
    credentials: true,
  });
}

export function createRateLimiter(perMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60 * 1000,
    max: perMinute,
    message: { error: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Forward rejections of an async route handler to the error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Parse request input with a zod schema, raising ValidationError on mismatch
 */
export function parseInput<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, value: unknown): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(problems);
  }
  return parsed.data;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`❌ ${req.method} ${req.path}: ${err.name}: ${err.message}`);
    }
    res.status(err.statusCode).json({ error: err.name, message: err.message });
    return;
  }

  // Malformed JSON bodies surface from express.json() as 400s
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ error: 'ValidationError', message: 'Request body is not valid JSON' });
    return;
  }

  console.error('Error:', err);
  res.status(500).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : undefined,
  });
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${sanitizeForLog(req.path)} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
