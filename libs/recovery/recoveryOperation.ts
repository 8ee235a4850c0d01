/**
 * Recovery Operation
 *
 * Owner-only, pause-gated. Moves every non-zero balance of an old holder to a
 * new holder in one atomic batch. The enumeration is linear in the number of
 * created credential types.
 */

import { Address } from '../identity/address.js';
import { AccessControl } from '../access/accessControl.js';
import { CredentialRegistry } from '../registry/credentialRegistry.js';
import { BalanceLedger } from '../ledger/balanceLedger.js';
import { EventJournal } from '../events/eventJournal.js';
import { EmptyRecoveryError, InvariantViolationError } from '../errors/credentialErrors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('RecoveryOperation');

export interface RecoveredBalance {
    readonly credentialTypeId: number;
    readonly amount: bigint;
}

export interface RecoveryReceipt {
    readonly oldHolder: Address;
    readonly newHolder: Address;
    readonly moved: readonly RecoveredBalance[];
}

/**
 * Every created type the holder has a strictly positive balance of, in id order.
 */
export function collectRecoverableBalances(
    holder: Address,
    registry: CredentialRegistry,
    ledger: BalanceLedger
): RecoveredBalance[] {
    const found: RecoveredBalance[] = [];
    const count = registry.count();
    for (let credentialTypeId = 0; credentialTypeId < count; credentialTypeId++) {
        const amount = ledger.balanceOf(holder, credentialTypeId);
        if (amount > 0n) {
            found.push({ credentialTypeId, amount });
        }
    }
    return found;
}

export class RecoveryOperation {
    constructor(
        private readonly access: AccessControl,
        private readonly registry: CredentialRegistry,
        private readonly ledger: BalanceLedger,
        private readonly journal: EventJournal
    ) { }

    public recover(caller: Address, oldHolder: Address, newHolder: Address): RecoveryReceipt {
        this.access.requireOwner(caller);
        this.access.requireNotPaused();

        if (oldHolder === newHolder) {
            throw new InvariantViolationError('SAME_HOLDER', 'Old and new holder must differ');
        }

        const moved = collectRecoverableBalances(oldHolder, this.registry, this.ledger);
        if (moved.length === 0) {
            logger.warn({ oldHolder, newHolder }, 'Recovery found nothing to move');
            throw new EmptyRecoveryError(oldHolder);
        }

        const ids = moved.map((entry) => entry.credentialTypeId);
        const amounts = moved.map((entry) => entry.amount);

        // The operator is the owner, which the transfer guard admits.
        this.ledger.move({ operator: caller, from: oldHolder, to: newHolder, ids, amounts });

        this.journal.append('CREDENTIALS_RECOVERED', {
            oldHolder,
            newHolder,
            credentialTypeIds: ids,
            amounts: amounts.map((amount) => amount.toString())
        });
        logger.info({ oldHolder, newHolder, credentialTypeIds: ids }, 'Credentials recovered');

        return { oldHolder, newHolder, moved };
    }
}
