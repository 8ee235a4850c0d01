import { Address } from '../identity/address.js';
import { EventJournal } from '../events/eventJournal.js';

/**
 * Per-holder monotonic counters. A holder's nonce only moves when a signed
 * authorization naming that holder is fully consumed by a successful mint.
 */
export class NonceRegistry {
    private nonces = new Map<Address, bigint>();

    constructor(private readonly journal: EventJournal) { }

    public nonceOf(holder: Address): bigint {
        return this.nonces.get(holder) ?? 0n;
    }

    /**
     * Marks the current nonce as used and returns it.
     */
    public consume(holder: Address): bigint {
        const current = this.nonceOf(holder);
        this.nonces.set(holder, current + 1n);
        this.journal.append('NONCE_CONSUMED', { holder, nonce: current.toString() });
        return current;
    }

    public checkpoint(): ReadonlyMap<Address, bigint> {
        return new Map(this.nonces);
    }

    public rollback(snapshot: ReadonlyMap<Address, bigint>): void {
        this.nonces = new Map(snapshot);
    }
}
