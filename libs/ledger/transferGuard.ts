/**
 * Non-Transfer Guard
 *
 * Installed as the ledger's before/after hooks. A movement is allowed only
 * when it is a mint (no source), a burn (no destination), or when the
 * operator holds the recovery role. Every permitted movement is journaled.
 */

import { AccessControl } from '../access/accessControl.js';
import { EventJournal } from '../events/eventJournal.js';
import { InvariantViolationError } from '../errors/credentialErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import { BalanceLedger, LedgerMovement } from './balanceLedger.js';

const logger = getComponentLogger('TransferGuard');

export type MovementKind = 'mint' | 'burn' | 'privileged-move';

export function classifyMovement(movement: LedgerMovement, access: AccessControl): MovementKind | null {
    if (movement.from === null) return 'mint';
    if (movement.to === null) return 'burn';
    if (access.isRecoveryRole(movement.operator)) return 'privileged-move';
    return null;
}

export function installTransferGuard(
    ledger: BalanceLedger,
    access: AccessControl,
    journal: EventJournal
): void {
    ledger.setHooks({
        beforeMove(movement) {
            if (classifyMovement(movement, access) === null) {
                logger.warn({
                    operator: movement.operator,
                    from: movement.from,
                    to: movement.to,
                    ids: movement.ids
                }, 'Transfer rejected: credentials are non-transferable');
                throw new InvariantViolationError(
                    'NON_TRANSFERABLE',
                    'Credentials are non-transferable'
                );
            }
        },

        afterMove(movement) {
            const amounts = movement.amounts.map((amount) => amount.toString());
            const [id] = movement.ids;
            const [amount] = amounts;
            if (movement.ids.length === 1 && id !== undefined && amount !== undefined) {
                journal.append('TRANSFER_SINGLE', {
                    operator: movement.operator,
                    from: movement.from,
                    to: movement.to,
                    credentialTypeId: id,
                    amount
                });
                return;
            }
            journal.append('TRANSFER_BATCH', {
                operator: movement.operator,
                from: movement.from,
                to: movement.to,
                credentialTypeIds: [...movement.ids],
                amounts
            });
        }
    });
}
