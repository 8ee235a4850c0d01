import { Clock } from "../clock/clock.js";
import {
    CredentialEventPayloads,
    CredentialEventRecord,
    CredentialEventType,
    GENESIS_HASH
} from "./schema.js";
import { computeEventHash } from "./integrity.js";

/**
 * Freezes a JSON value and everything reachable from it.
 */
function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

export interface JournalCheckpoint {
    readonly length: number;
    readonly lastHash: string;
}

/**
 * Hash-chained, append-only record of engine state transitions.
 * Records appended by an operation that later fails are discarded by
 * rollback, so the journal only ever holds committed transitions.
 */
export class EventJournal {
    private readonly entries: CredentialEventRecord[] = [];
    private lastHash: string = GENESIS_HASH;

    constructor(private readonly clock: Clock) { }

    public append<T extends CredentialEventType>(
        eventType: T,
        payload: CredentialEventPayloads[T]
    ): CredentialEventRecord {
        const contents = {
            sequence: this.entries.length,
            eventType,
            timestamp: this.clock.now(),
            payload: structuredClone(payload)
        };
        const prevHash = this.lastHash;
        const hash = computeEventHash(contents, prevHash);

        // Records are shared with readers; nothing reachable from one may change after it is hashed.
        const record = deepFreeze({ ...contents, integrity: { prevHash, hash } }) as CredentialEventRecord;
        this.entries.push(record);
        this.lastHash = hash;
        return record;
    }

    public records(): readonly CredentialEventRecord[] {
        return this.entries.slice();
    }

    /**
     * Records with sequence >= fromSequence.
     */
    public since(fromSequence: number): readonly CredentialEventRecord[] {
        return this.entries.slice(Math.max(0, fromSequence));
    }

    public get length(): number {
        return this.entries.length;
    }

    public get headHash(): string {
        return this.lastHash;
    }

    public checkpoint(): JournalCheckpoint {
        return { length: this.entries.length, lastHash: this.lastHash };
    }

    public rollback(checkpoint: JournalCheckpoint): void {
        this.entries.length = checkpoint.length;
        this.lastHash = checkpoint.lastHash;
    }
}
