/**
 * Security Middleware
 *
 * Response headers for a JSON/text API that browsers call cross-origin
 * (the intake widget is embedded on each organization's own site).
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Security headers middleware.
 * Adds essential security headers to all responses.
 */
export function addSecurityHeaders(req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Nothing here renders HTML
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}

/**
 * CORS middleware.
 * `allowedOrigin` is "*" or a comma-separated list of exact origins.
 * Preflight requests are answered here with 204.
 */
export function allowCrossOrigin(allowedOrigin: string): RequestHandler {
    const origins = allowedOrigin.split(',').map(origin => origin.trim()).filter(Boolean);
    const allowAny = origins.includes('*');

    return (req: Request, res: Response, next: NextFunction) => {
        const requestOrigin = req.get('Origin');

        if (allowAny) {
            res.setHeader('Access-Control-Allow-Origin', '*');
        } else if (requestOrigin && origins.includes(requestOrigin)) {
            res.setHeader('Access-Control-Allow-Origin', requestOrigin);
            res.setHeader('Vary', 'Origin');
        }

        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (req.method === 'OPTIONS') {
            res.status(204).end();
            return;
        }

        next();
    };
}
