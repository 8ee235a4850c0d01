/**
 * Issuance Engine
 *
 * Validates a mint against the pause switch, the registry, the type's mint
 * window and the deployment's authorization mode, then credits one unit
 * through the balance ledger. Preconditions run in a fixed order and the
 * first failure aborts the mint; nothing is mutated until all have passed.
 *
 * Value forwarding is not done here: the caller forwards the returned value
 * once every mutation of the operation is complete.
 */

import { Address } from '../identity/address.js';
import { Clock } from '../clock/clock.js';
import { AccessControl } from '../access/accessControl.js';
import { CredentialRegistry, CredentialType } from '../registry/credentialRegistry.js';
import { BalanceLedger } from '../ledger/balanceLedger.js';
import { EventJournal } from '../events/eventJournal.js';
import { NonceRegistry } from '../signature/nonceRegistry.js';
import { MintAuthorization, verifyMintAuthorization } from '../signature/mintAuthorization.js';
import {
    AuthorizationError,
    InvariantViolationError,
    StateError,
    ValueError,
    WindowError
} from '../errors/credentialErrors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('IssuanceEngine');

export type AuthorizationMode = 'role' | 'signature';

export interface MintRequest {
    to: Address;
    credentialTypeId: number;
    /** Value attached to the call; forwarded in full to the treasury */
    value?: bigint;
    authorization?: MintAuthorization;
}

export interface IssuanceReceipt {
    readonly to: Address;
    readonly credentialTypeId: number;
    readonly value: bigint;
    readonly path: AuthorizationMode;
    /** Nonce consumed by a signed mint */
    readonly nonce?: bigint;
}

export type MintWindowStatus = 'NOT_STARTED' | 'OPEN' | 'ENDED';

export function mintWindowStatus(type: CredentialType, now: number): MintWindowStatus {
    if (now < type.startTime) return 'NOT_STARTED';
    if (type.endTime !== 0 && now >= type.endTime) return 'ENDED';
    return 'OPEN';
}

export class IssuanceEngine {
    constructor(
        public readonly mode: AuthorizationMode,
        private readonly domainId: bigint,
        private readonly access: AccessControl,
        private readonly registry: CredentialRegistry,
        private readonly ledger: BalanceLedger,
        private readonly nonces: NonceRegistry,
        private readonly journal: EventJournal,
        private readonly clock: Clock
    ) { }

    public isMintable(credentialTypeId: number): boolean {
        if (this.access.isPaused() || !this.registry.isCreated(credentialTypeId)) {
            return false;
        }
        return mintWindowStatus(this.registry.getMetadata(credentialTypeId), this.clock.now()) === 'OPEN';
    }

    public mint(caller: Address, request: MintRequest): IssuanceReceipt {
        const { to, credentialTypeId } = request;
        const value = request.value ?? 0n;
        const now = this.clock.now();

        this.access.requireNotPaused();
        const type = this.registry.getMetadata(credentialTypeId);

        const window = mintWindowStatus(type, now);
        if (window !== 'OPEN') {
            logger.warn({ credentialTypeId, now, window }, 'Mint outside window');
            throw new WindowError(window, credentialTypeId, now);
        }

        if (value < 0n) {
            throw new ValueError('INVALID_AMOUNT', 'Value must not be negative');
        }

        let nonce: bigint | undefined;
        if (this.mode === 'role') {
            if (request.authorization) {
                throw new StateError('WRONG_AUTHORIZATION_MODE', 'This deployment mints by role; signed authorizations are not accepted');
            }
            this.access.requireMinter(caller);
            // Any positive value on the role path is a voluntary donation.
        } else {
            nonce = this.authorizeSigned(request, type, value, now);
        }

        this.ledger.move({
            operator: caller,
            from: null,
            to,
            ids: [credentialTypeId],
            amounts: [1n]
        });
        if (nonce !== undefined) {
            this.nonces.consume(to);
        }

        this.journal.append('CREDENTIAL_ISSUED', {
            to,
            credentialTypeId,
            value: value.toString(),
            path: this.mode
        });
        logger.info({ caller, to, credentialTypeId, path: this.mode }, 'Credential issued');

        return { to, credentialTypeId, value, path: this.mode, ...(nonce !== undefined ? { nonce } : {}) };
    }

    /**
     * Runs every signature-path check without consuming the nonce.
     * Returns the nonce the caller must consume once the credit succeeds.
     */
    private authorizeSigned(request: MintRequest, type: CredentialType, value: bigint, now: number): bigint {
        const { authorization, to, credentialTypeId } = request;
        if (!authorization) {
            throw new AuthorizationError('MISSING_AUTHORIZATION', 'This deployment requires a signed mint authorization');
        }

        const nonce = this.nonces.nonceOf(to);
        try {
            verifyMintAuthorization(
                { ...authorization, recipient: to, credentialTypeId },
                {
                    trustedSigner: this.access.getSigner(),
                    domainId: this.domainId,
                    nonce,
                    now
                }
            );
        } catch (err) {
            logger.warn({ to, credentialTypeId, nonce: nonce.toString() }, 'Signed mint authorization rejected');
            throw err;
        }

        if (authorization.requiredPrice < type.price) {
            throw new ValueError(
                'PRICE_BELOW_REGISTERED',
                `Authorized price ${authorization.requiredPrice} is below the registered price ${type.price}`
            );
        }
        if (value < authorization.requiredPrice) {
            throw new ValueError(
                'INSUFFICIENT_VALUE',
                `Attached value ${value} is below the required price ${authorization.requiredPrice}`
            );
        }
        if (this.ledger.balanceOf(to, credentialTypeId) > 0n) {
            throw new InvariantViolationError(
                'ALREADY_HOLDS',
                `${to} already holds credential type ${credentialTypeId}`
            );
        }

        return nonce;
    }
}
