/**
 * HTTP hardening for the ballot API: response headers, request logging
 * and a per-client rate limiter for mutating routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface SecurityConfig {
  /** Enable HSTS (HTTP Strict Transport Security) */
  enableHSTS: boolean;
  /** HSTS max age in seconds */
  hstsMaxAge: number;
  /** Disable request logging */
  disableLogging: boolean;
}

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  enableHSTS: true,
  hstsMaxAge: 31536000, // 1 year
  disableLogging: false,
};

/**
 * Security headers middleware. The API serves JSON only, so the
 * content policy forbids everything.
 */
export function securityHeaders(config: Partial<SecurityConfig> = {}): RequestHandler {
  const cfg = { ...DEFAULT_SECURITY_CONFIG, ...config };

  return (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Cross-Origin-Resource-Policy', 'same-origin');

    if (cfg.enableHSTS) {
      res.setHeader('Strict-Transport-Security', `max-age=${cfg.hstsMaxAge}; includeSubDomains`);
    }

    res.removeHeader('X-Powered-By');

    next();
  };
}

/**
 * One console line per finished request
 */
export function requestLogging(disabled: boolean = false): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (disabled) {
      return next();
    }

    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(
        `[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`
      );
    });

    next();
  };
}

/**
 * Fixed-window rate limiter keyed by client address
 */
export function rateLimiter(windowMs: number, maxRequests: number): RequestHandler {
  const requests = new Map<string, { count: number; resetAt: number }>();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const now = Date.now();

    // Clean up expired entries periodically
    if (Math.random() < 0.01) {
      for (const [k, v] of requests.entries()) {
        if (v.resetAt < now) {
          requests.delete(k);
        }
      }
    }

    let entry = requests.get(key);
    if (!entry || entry.resetAt < now) {
      entry = { count: 0, resetAt: now + windowMs };
      requests.set(key, entry);
    }

    entry.count++;

    if (entry.count > maxRequests) {
      res.status(429).json({
        error: 'Too many requests',
        code: 'RATE_LIMITED',
        retryAfter: Math.ceil((entry.resetAt - now) / 1000),
      });
      return;
    }

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetAt / 1000).toString());

    next();
  };
}
