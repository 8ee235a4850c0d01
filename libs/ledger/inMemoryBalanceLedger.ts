import { Address } from '../identity/address.js';
import { InvariantViolationError, ValueError } from '../errors/credentialErrors.js';
import { BalanceLedger, LedgerHooks, LedgerMovement } from './balanceLedger.js';

export interface InMemoryLedgerCheckpoint {
    readonly balances: ReadonlyMap<string, bigint>;
    readonly supply: ReadonlyMap<number, bigint>;
    readonly approvals: ReadonlySet<string>;
}

function balanceKey(holder: Address, id: number): string {
    return `${holder}:${id}`;
}

function approvalKey(holder: Address, operator: Address): string {
    return `${holder}>${operator}`;
}

/**
 * Process-local BalanceLedger. Zero balances are not stored.
 */
export class InMemoryBalanceLedger implements BalanceLedger<InMemoryLedgerCheckpoint> {
    private balances = new Map<string, bigint>();
    private supply = new Map<number, bigint>();
    private approvals = new Set<string>();
    private hooks: LedgerHooks = {};

    public balanceOf(holder: Address, id: number): bigint {
        return this.balances.get(balanceKey(holder, id)) ?? 0n;
    }

    public balanceOfBatch(holders: readonly Address[], ids: readonly number[]): bigint[] {
        if (holders.length !== ids.length) {
            throw new InvariantViolationError('LENGTH_MISMATCH', 'holders and ids length mismatch');
        }
        return holders.map((holder, i) => this.balanceOf(holder, ids[i] ?? -1));
    }

    public totalSupply(id: number): bigint {
        return this.supply.get(id) ?? 0n;
    }

    public isApprovedForAll(holder: Address, operator: Address): boolean {
        return this.approvals.has(approvalKey(holder, operator));
    }

    public setApprovalForAll(holder: Address, operator: Address, approved: boolean): void {
        const key = approvalKey(holder, operator);
        if (approved) {
            this.approvals.add(key);
        } else {
            this.approvals.delete(key);
        }
    }

    public setHooks(hooks: LedgerHooks): void {
        this.hooks = hooks;
    }

    public move(movement: LedgerMovement): void {
        const { from, to, ids, amounts } = movement;
        if (ids.length !== amounts.length) {
            throw new InvariantViolationError('LENGTH_MISMATCH', 'ids and amounts length mismatch');
        }
        if (from === null && to === null) {
            throw new InvariantViolationError('ZERO_ADDRESS', 'A movement needs a source or a destination');
        }

        this.hooks.beforeMove?.(movement);

        // Validate every leg before touching state so the batch stays atomic.
        const debits = new Map<string, bigint>();
        for (let i = 0; i < ids.length; i++) {
            const id = ids[i] ?? -1;
            const amount = amounts[i] ?? 0n;
            if (amount < 0n) {
                throw new ValueError('INVALID_AMOUNT', `Amount for credential type ${id} must not be negative`);
            }
            if (from !== null) {
                const key = balanceKey(from, id);
                const pending = (debits.get(key) ?? 0n) + amount;
                const available = this.balances.get(key) ?? 0n;
                if (available < pending) {
                    throw new InvariantViolationError(
                        'INSUFFICIENT_BALANCE',
                        `Holder ${from} has ${available} of credential type ${id}, needs ${pending}`
                    );
                }
                debits.set(key, pending);
            }
        }

        for (let i = 0; i < ids.length; i++) {
            const id = ids[i] ?? -1;
            const amount = amounts[i] ?? 0n;
            if (from !== null) {
                this.adjust(balanceKey(from, id), -amount);
            } else {
                this.supply.set(id, this.totalSupply(id) + amount);
            }
            if (to !== null) {
                this.adjust(balanceKey(to, id), amount);
            } else {
                this.supply.set(id, this.totalSupply(id) - amount);
            }
        }

        this.hooks.afterMove?.(movement);
    }

    public checkpoint(): InMemoryLedgerCheckpoint {
        return {
            balances: new Map(this.balances),
            supply: new Map(this.supply),
            approvals: new Set(this.approvals)
        };
    }

    public rollback(checkpoint: InMemoryLedgerCheckpoint): void {
        this.balances = new Map(checkpoint.balances);
        this.supply = new Map(checkpoint.supply);
        this.approvals = new Set(checkpoint.approvals);
    }

    private adjust(key: string, delta: bigint): void {
        const next = (this.balances.get(key) ?? 0n) + delta;
        if (next === 0n) {
            this.balances.delete(key);
        } else {
            this.balances.set(key, next);
        }
    }
}
