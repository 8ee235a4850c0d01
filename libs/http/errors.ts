import type { ErrorRequestHandler } from 'express';
import { InputValidationError, isCredentialEngineError } from '../errors/credentialErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { AuthenticationError } from './auth.js';

export interface ErrorBody {
    error: {
        code: string;
        kind: string;
        message: string;
        issues?: ReadonlyArray<{ path: string; message: string }>;
        incidentId?: string;
    };
}

function isBodyParseError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Maps engine errors to their status codes; anything else is sanitized to a 500
 * carrying only an incident id.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (isCredentialEngineError(err)) {
        const body: ErrorBody = { error: { code: err.code, kind: err.kind, message: err.message } };
        if (err instanceof InputValidationError && err.issues.length > 0) {
            body.error.issues = err.issues;
        }
        res.status(err.statusCode).json(body);
        return;
    }

    if (err instanceof AuthenticationError) {
        const body: ErrorBody = { error: { code: err.code, kind: 'AuthenticationError', message: err.message } };
        res.status(err.statusCode).json(body);
        return;
    }

    if (isBodyParseError(err)) {
        const body: ErrorBody = { error: { code: 'INVALID_INPUT', kind: 'InputValidationError', message: 'Malformed JSON body' } };
        res.status(400).json(body);
        return;
    }

    const internal = ErrorSanitizer.sanitize(err, 'CredentialApi');
    const body: ErrorBody = {
        error: {
            code: 'INTERNAL_ERROR',
            kind: 'InternalError',
            message: internal.publicMessage,
            incidentId: internal.incidentId
        }
    };
    res.status(internal.statusCode).json(body);
};
