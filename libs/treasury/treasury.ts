/**
 * Treasury Value Forwarding
 *
 * Value attached to a mint, or sent with no call at all, is passed on in full
 * to the treasury identity. The transport is an external collaborator and may
 * call back into the engine, so the engine invokes the forwarder only after
 * every state mutation of the current operation is done.
 */

import { Address } from '../identity/address.js';
import { AccessControl } from '../access/accessControl.js';
import { EventJournal } from '../events/eventJournal.js';
import { StateError, ValueError } from '../errors/credentialErrors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('TreasuryForwarder');

export interface ValueTransport {
    forward(from: Address, treasury: Address, amount: bigint): void;
}

/**
 * Transport that keeps per-treasury totals in process.
 */
export class InMemoryValueTransport implements ValueTransport {
    private readonly received = new Map<Address, bigint>();

    forward(_from: Address, treasury: Address, amount: bigint): void {
        this.received.set(treasury, this.balanceOf(treasury) + amount);
    }

    balanceOf(treasury: Address): bigint {
        return this.received.get(treasury) ?? 0n;
    }
}

export class TreasuryForwarder {
    constructor(
        private readonly access: AccessControl,
        private readonly transport: ValueTransport,
        private readonly journal: EventJournal
    ) { }

    public forward(from: Address, amount: bigint): void {
        if (amount < 0n) {
            throw new ValueError('INVALID_AMOUNT', 'Value must not be negative');
        }
        if (amount === 0n) return;

        const treasury = this.access.getTreasury();
        if (treasury === null) {
            throw new StateError('TREASURY_UNSET', 'No treasury is configured to receive value');
        }

        this.journal.append('VALUE_FORWARDED', { from, treasury, amount: amount.toString() });
        this.transport.forward(from, treasury, amount);
        logger.info({ from, treasury, amount: amount.toString() }, 'Value forwarded to treasury');
    }
}
