/**
 * Security Middleware
 *
 * Security headers, an optional shared API key, and a per-client rate limiter
 * for the ask endpoints.
 */

import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationError, RateLimitError, handleRouteError } from '../utils/errorHandler';

/**
 * Security headers middleware.
 * Adds essential security headers to all responses. The service only serves
 * JSON, so the CSP denies everything.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');

    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}

function keysMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Require `x-api-key` to equal the configured key. With no key configured
 * every request passes.
 */
export function requireApiKey(apiKey: string | undefined): RequestHandler {
    return (req, res, next) => {
        if (!apiKey) {
            return next();
        }
        const provided = req.headers['x-api-key'];
        if (typeof provided !== 'string' || !keysMatch(provided, apiKey)) {
            return handleRouteError(res, new AuthenticationError());
        }
        next();
    };
}

export type RateLimitOptions = {
    windowMs: number;
    maxRequests: number;
    now?: () => number;
};

/**
 * Fixed-window rate limit per client IP.
 */
export function createRateLimiter(options: RateLimitOptions): RequestHandler {
    const { windowMs, maxRequests, now = Date.now } = options;
    const clients = new Map<string, { count: number; resetTime: number }>();

    return (req, res, next) => {
        const clientId = req.ip || 'unknown';
        const current = now();
        const clientData = clients.get(clientId);

        if (!clientData || current > clientData.resetTime) {
            clients.set(clientId, { count: 1, resetTime: current + windowMs });
            return next();
        }

        if (clientData.count >= maxRequests) {
            const retryAfter = Math.ceil((clientData.resetTime - current) / 1000);
            console.warn(`[Security] Rate limit hit for ${clientId}`);
            res.set('Retry-After', retryAfter.toString());
            return handleRouteError(res, new RateLimitError('Too many requests, try again later'));
        }

        clientData.count++;
        next();
    };
}
