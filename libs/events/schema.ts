/**
 * Credential Event Schema
 * Every committed state transition appends one record. Quantities and values
 * are carried as decimal strings so records stay JSON-safe.
 */

export interface CredentialEventPayloads {
    CREDENTIAL_TYPE_CREATED: {
        credentialTypeId: number;
        name: string;
        creator: string;
        startTime: number;
        endTime: number;
        price: string;
    };
    CREDENTIAL_ISSUED: {
        to: string;
        credentialTypeId: number;
        value: string;
        path: 'role' | 'signature';
    };
    CREDENTIALS_RECOVERED: {
        oldHolder: string;
        newHolder: string;
        credentialTypeIds: number[];
        amounts: string[];
    };
    CREDENTIALS_BURNED: {
        operator: string;
        holder: string;
        credentialTypeIds: number[];
        amounts: string[];
    };
    TRANSFER_SINGLE: {
        operator: string;
        from: string | null;
        to: string | null;
        credentialTypeId: number;
        amount: string;
    };
    TRANSFER_BATCH: {
        operator: string;
        from: string | null;
        to: string | null;
        credentialTypeIds: number[];
        amounts: string[];
    };
    APPROVAL_FOR_ALL: {
        holder: string;
        operator: string;
        approved: boolean;
    };
    MINTER_ADDED: { minter: string };
    MINTER_REMOVED: { minter: string };
    SIGNER_UPDATED: { previousSigner: string | null; signer: string };
    TREASURY_UPDATED: { previousTreasury: string | null; treasury: string };
    BASE_URI_UPDATED: { baseURI: string };
    PAUSED: { account: string };
    UNPAUSED: { account: string };
    OWNERSHIP_TRANSFER_STARTED: { previousOwner: string; pendingOwner: string };
    OWNERSHIP_TRANSFERRED: { previousOwner: string; newOwner: string };
    NONCE_CONSUMED: { holder: string; nonce: string };
    VALUE_FORWARDED: { from: string; treasury: string; amount: string };
}

export type CredentialEventType = keyof CredentialEventPayloads;

export interface EventIntegrity {
    prevHash: string;     // Hash of the immediately preceding record
    hash: string;         // SHA-256(canonical(record without integrity) || prevHash)
}

export type CredentialEventRecord = {
    [T in CredentialEventType]: {
        sequence: number;
        eventType: T;
        timestamp: number;
        payload: CredentialEventPayloads[T];
        integrity: EventIntegrity;
    }
}[CredentialEventType];

export const GENESIS_HASH = '0'.repeat(64);
