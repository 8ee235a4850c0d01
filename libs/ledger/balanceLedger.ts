/**
 * Balance Ledger Contract
 *
 * The multi-asset bookkeeping primitive the engine consumes: per-(holder, id)
 * balances, supply counters, operator approvals and atomic single/batch
 * movements. A null `from` is a mint and a null `to` is a burn.
 */

import { Address } from '../identity/address.js';

export interface LedgerMovement {
    readonly operator: Address;
    readonly from: Address | null;
    readonly to: Address | null;
    readonly ids: readonly number[];
    readonly amounts: readonly bigint[];
}

export interface LedgerHooks {
    /** Runs before any balance changes; throwing aborts the movement. */
    beforeMove?(movement: LedgerMovement): void;
    /** Runs after the balances of a movement have been applied. */
    afterMove?(movement: LedgerMovement): void;
}

export interface BalanceLedger<TCheckpoint = unknown> {
    balanceOf(holder: Address, id: number): bigint;
    balanceOfBatch(holders: readonly Address[], ids: readonly number[]): bigint[];
    totalSupply(id: number): bigint;

    isApprovedForAll(holder: Address, operator: Address): boolean;
    setApprovalForAll(holder: Address, operator: Address, approved: boolean): void;

    /**
     * Applies one movement atomically: either every (id, amount) pair moves or
     * none does. Approval is the caller's concern.
     */
    move(movement: LedgerMovement): void;

    setHooks(hooks: LedgerHooks): void;

    checkpoint(): TCheckpoint;
    rollback(checkpoint: TCheckpoint): void;
}
