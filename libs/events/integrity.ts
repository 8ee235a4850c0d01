import crypto from "crypto";
import { EventIntegrity, GENESIS_HASH } from "./schema.js";

/**
 * The shape the chain is computed over. Every CredentialEventRecord has it,
 * as does a record read back from an export.
 */
export interface ChainedRecord {
    sequence: number;
    eventType: string;
    timestamp: number;
    payload: unknown;
    integrity: EventIntegrity;
}

const sortValue = (value: unknown): unknown => {
    if (Array.isArray(value)) {
        return value.map((entry) => sortValue(entry));
    }
    if (value && typeof value === "object") {
        return Object.entries(value)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .reduce<Record<string, unknown>>((acc, [key, entry]) => {
                acc[key] = sortValue(entry);
                return acc;
            }, {});
    }
    return value;
};

export const canonicalizeJson = (value: unknown): string => JSON.stringify(sortValue(value));

export function computeEventHash(contents: Omit<ChainedRecord, 'integrity'>, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(canonicalizeJson(contents) + prevHash)
        .digest("hex");
}

/**
 * Event Chain Verifier
 * Validates the hash links of a journal export, oldest record first.
 */
export function verifyEventChain(records: readonly ChainedRecord[], startHash: string = GENESIS_HASH): {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
} {
    let lastHash = startHash;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        const { integrity, ...contentsOnly } = record;
        const computedHash = computeEventHash(contentsOnly, integrity.prevHash);

        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}
