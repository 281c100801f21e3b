/**
 * Security Middleware
 * 
 * Security headers for a JSON-only webhook service.
 */

import type { Request, Response, NextFunction } from 'express';

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(_req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    res.setHeader('Referrer-Policy', 'no-referrer');

    // Nothing here is ever rendered by a browser
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}
