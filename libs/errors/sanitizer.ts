import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error Information Disclosure Prevention
 * Wraps unexpected internal errors in a generic message with an incident id
 * that correlates the public response with the logged details.
 */

export class InternalError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly statusCode = 500;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'InternalError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized InternalError.
     */
    sanitize: (err: unknown, contextLabel: string): InternalError => {
        if (err instanceof InternalError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new InternalError(
            `An internal error occurred (${contextLabel}).`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel }
        );
    }
};
