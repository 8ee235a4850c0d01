import type { Request, RequestHandler, Response } from 'express';
import { jwtVerify } from 'jose';
import { Address, toAddress } from '../identity/address.js';
import { ApiConfig } from '../bootstrap/config/engine-config.js';
import { logger } from '../logging/logger.js';

const CLOCK_TOLERANCE_SECONDS = 30;

export class AuthenticationError extends Error {
    readonly code = 'UNAUTHENTICATED';
    readonly statusCode = 401;

    constructor(message: string) {
        super(message);
        this.name = 'AuthenticationError';
    }
}

function extractBearerToken(req: Request): string {
    const header = req.headers.authorization;
    if (!header) {
        throw new AuthenticationError('Missing Authorization header');
    }
    const [scheme, token] = header.split(' ');
    if (scheme !== 'Bearer' || !token) {
        throw new AuthenticationError('Authorization header must use the Bearer scheme');
    }
    return token;
}

/**
 * Verifies an HS256 bearer token and returns the caller address carried in `sub`.
 */
export async function authenticateCaller(token: string, config: ApiConfig): Promise<Address> {
    let subject: string | undefined;
    try {
        const { payload } = await jwtVerify(token, new TextEncoder().encode(config.jwtSecret), {
            issuer: config.jwtIssuer,
            audience: config.jwtAudience,
            clockTolerance: CLOCK_TOLERANCE_SECONDS,
            requiredClaims: ['sub', 'exp'],
            algorithms: ['HS256']
        });
        subject = payload.sub;
    } catch (error: unknown) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.warn({ error: errorMessage }, 'JWT verification failed');
        throw new AuthenticationError(`JWT verification failed: ${errorMessage}`);
    }

    if (!subject) {
        throw new AuthenticationError('Token subject is missing');
    }
    try {
        return toAddress(subject, 'sub');
    } catch {
        throw new AuthenticationError('Token subject is not an address');
    }
}

/**
 * Express middleware: authenticates the request and stores the caller on res.locals.
 */
export function requireCaller(config: ApiConfig): RequestHandler {
    return (req, res, next) => {
        let token: string;
        try {
            token = extractBearerToken(req);
        } catch (error) {
            next(error);
            return;
        }
        authenticateCaller(token, config)
            .then((caller) => {
                res.locals.caller = caller;
                next();
            })
            .catch(next);
    };
}

export function getCaller(res: Response): Address {
    const caller: unknown = res.locals.caller;
    if (typeof caller !== 'string') {
        throw new AuthenticationError('Request is not authenticated');
    }
    return caller;
}
