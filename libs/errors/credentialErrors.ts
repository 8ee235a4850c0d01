/**
 * Credential Engine Error Taxonomy
 * Every rejected precondition surfaces as one of these classes. The engine
 * never retries; callers correct the triggering condition and resubmit.
 */

export type CredentialErrorKind =
    | 'AuthorizationError'
    | 'StateError'
    | 'NotFoundError'
    | 'WindowError'
    | 'ValueError'
    | 'InvariantViolation'
    | 'EmptyRecoveryError'
    | 'InputValidationError';

export type AuthorizationErrorCode =
    | 'NOT_OWNER'
    | 'NOT_PENDING_OWNER'
    | 'NOT_MINTER'
    | 'NOT_HOLDER_OR_OPERATOR'
    | 'INVALID_SIGNATURE'
    | 'EXPIRED'
    | 'MISSING_AUTHORIZATION';

export type StateErrorCode =
    | 'PAUSED'
    | 'NOT_PAUSED'
    | 'REENTRANT_CALL'
    | 'WRONG_AUTHORIZATION_MODE'
    | 'TREASURY_UNSET';

export type WindowErrorCode = 'NOT_STARTED' | 'ENDED';

export type ValueErrorCode =
    | 'INSUFFICIENT_VALUE'
    | 'PRICE_BELOW_REGISTERED'
    | 'INVALID_AMOUNT';

export type InvariantViolationCode =
    | 'NON_TRANSFERABLE'
    | 'MINTER_EXISTS'
    | 'MINTER_MISSING'
    | 'ALREADY_HOLDS'
    | 'INSUFFICIENT_BALANCE'
    | 'SAME_HOLDER'
    | 'INVALID_WINDOW'
    | 'ZERO_ADDRESS'
    | 'LENGTH_MISMATCH';

export type CredentialErrorCode =
    | AuthorizationErrorCode
    | StateErrorCode
    | 'CREDENTIAL_TYPE_NOT_FOUND'
    | WindowErrorCode
    | ValueErrorCode
    | InvariantViolationCode
    | 'NOTHING_TO_RECOVER'
    | 'INVALID_INPUT';

export abstract class CredentialEngineError extends Error {
    abstract readonly kind: CredentialErrorKind;
    abstract readonly statusCode: number;

    constructor(
        public readonly code: CredentialErrorCode,
        message: string
    ) {
        super(message);
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class AuthorizationError extends CredentialEngineError {
    readonly kind = 'AuthorizationError';
    readonly statusCode = 403;
    declare readonly code: AuthorizationErrorCode;

    constructor(code: AuthorizationErrorCode, message?: string) {
        super(code, message ?? `Authorization failed: ${code}`);
        this.name = 'AuthorizationError';
    }
}

export class StateError extends CredentialEngineError {
    readonly kind = 'StateError';
    readonly statusCode = 409;
    declare readonly code: StateErrorCode;

    constructor(code: StateErrorCode, message?: string) {
        super(code, message ?? `Invalid engine state: ${code}`);
        this.name = 'StateError';
    }
}

export class NotFoundError extends CredentialEngineError {
    readonly kind = 'NotFoundError';
    readonly statusCode = 404;

    constructor(public readonly credentialTypeId: number) {
        super('CREDENTIAL_TYPE_NOT_FOUND', `Credential type ${credentialTypeId} is not created`);
        this.name = 'NotFoundError';
    }
}

export class WindowError extends CredentialEngineError {
    readonly kind = 'WindowError';
    readonly statusCode = 422;
    declare readonly code: WindowErrorCode;

    constructor(
        code: WindowErrorCode,
        public readonly credentialTypeId: number,
        public readonly now: number
    ) {
        super(
            code,
            code === 'NOT_STARTED'
                ? `Mint window for credential type ${credentialTypeId} has not started`
                : `Mint window for credential type ${credentialTypeId} has ended`
        );
        this.name = 'WindowError';
    }
}

export class ValueError extends CredentialEngineError {
    readonly kind = 'ValueError';
    readonly statusCode = 422;
    declare readonly code: ValueErrorCode;

    constructor(code: ValueErrorCode, message?: string) {
        super(code, message ?? `Value rejected: ${code}`);
        this.name = 'ValueError';
    }
}

export class InvariantViolationError extends CredentialEngineError {
    readonly kind = 'InvariantViolation';
    readonly statusCode = 409;
    declare readonly code: InvariantViolationCode;

    constructor(code: InvariantViolationCode, message?: string) {
        super(code, message ?? `Invariant violation: ${code}`);
        this.name = 'InvariantViolationError';
    }
}

export class EmptyRecoveryError extends CredentialEngineError {
    readonly kind = 'EmptyRecoveryError';
    readonly statusCode = 409;

    constructor(public readonly oldHolder: string) {
        super('NOTHING_TO_RECOVER', `Holder ${oldHolder} has no credentials to recover`);
        this.name = 'EmptyRecoveryError';
    }
}

export class InputValidationError extends CredentialEngineError {
    readonly kind = 'InputValidationError';
    readonly statusCode = 400;

    constructor(
        message: string,
        public readonly issues: ReadonlyArray<{ path: string; message: string }> = []
    ) {
        super('INVALID_INPUT', message);
        this.name = 'InputValidationError';
    }
}

export function isCredentialEngineError(err: unknown): err is CredentialEngineError {
    return err instanceof CredentialEngineError;
}
