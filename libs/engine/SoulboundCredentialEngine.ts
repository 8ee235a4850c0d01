/**
 * Soulbound Credential Engine
 *
 * Root state object and boundary of the system. Every operation takes the
 * caller identity explicitly, normalizes addresses, and runs as one
 * all-or-nothing transition: component state is checkpointed up front and
 * restored if anything throws, including the treasury forward that runs last.
 */

import { Address, toAddress, toNonZeroAddress } from '../identity/address.js';
import { Clock, SystemClock } from '../clock/clock.js';
import { AccessControl } from '../access/accessControl.js';
import { CreateCredentialTypeInput, CredentialRegistry, CredentialType } from '../registry/credentialRegistry.js';
import { BalanceLedger } from '../ledger/balanceLedger.js';
import { InMemoryBalanceLedger } from '../ledger/inMemoryBalanceLedger.js';
import { installTransferGuard } from '../ledger/transferGuard.js';
import { EventJournal } from '../events/eventJournal.js';
import { CredentialEventRecord } from '../events/schema.js';
import { NonceRegistry } from '../signature/nonceRegistry.js';
import { AuthorizationMode, IssuanceEngine, IssuanceReceipt, MintRequest } from '../issuance/issuanceEngine.js';
import { RecoveryOperation, RecoveryReceipt } from '../recovery/recoveryOperation.js';
import { InMemoryValueTransport, TreasuryForwarder, ValueTransport } from '../treasury/treasury.js';
import { ReentrancyGuard } from './reentrancyGuard.js';
import { AuthorizationError, InputValidationError, InvariantViolationError } from '../errors/credentialErrors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('SoulboundCredentialEngine');

export interface EngineConfig {
    owner: string;
    authorizationMode: AuthorizationMode;
    /** Binds signed authorizations to this deployment; required in signature mode */
    domainId?: bigint;
    signer?: string | null;
    treasury?: string | null;
    baseMetadataURI?: string;
}

export interface EngineDependencies {
    clock?: Clock;
    ledger?: BalanceLedger;
    valueTransport?: ValueTransport;
}

export class SoulboundCredentialEngine {
    private readonly clock: Clock;
    private readonly journal: EventJournal;
    private readonly access: AccessControl;
    private readonly registry: CredentialRegistry;
    private readonly ledger: BalanceLedger;
    private readonly nonces: NonceRegistry;
    private readonly issuance: IssuanceEngine;
    private readonly recovery: RecoveryOperation;
    private readonly forwarder: TreasuryForwarder;
    private readonly guard = new ReentrancyGuard();

    constructor(config: EngineConfig, deps: EngineDependencies = {}) {
        if (config.authorizationMode === 'signature' && config.domainId === undefined) {
            throw new InputValidationError('domainId is required when authorizationMode is signature');
        }

        this.clock = deps.clock ?? new SystemClock();
        this.journal = new EventJournal(this.clock);
        this.access = new AccessControl({
            owner: config.owner,
            signer: config.signer ?? null,
            treasury: config.treasury ?? null,
            baseMetadataURI: config.baseMetadataURI ?? ''
        }, this.journal);
        this.registry = new CredentialRegistry(this.access, this.journal, this.clock);
        this.ledger = deps.ledger ?? new InMemoryBalanceLedger();
        installTransferGuard(this.ledger, this.access, this.journal);
        this.nonces = new NonceRegistry(this.journal);
        this.issuance = new IssuanceEngine(
            config.authorizationMode,
            config.domainId ?? 0n,
            this.access,
            this.registry,
            this.ledger,
            this.nonces,
            this.journal,
            this.clock
        );
        this.recovery = new RecoveryOperation(this.access, this.registry, this.ledger, this.journal);
        this.forwarder = new TreasuryForwarder(this.access, deps.valueTransport ?? new InMemoryValueTransport(), this.journal);

        logger.info({
            owner: this.access.getOwner(),
            authorizationMode: config.authorizationMode,
            signer: this.access.getSigner(),
            treasury: this.access.getTreasury()
        }, 'Credential engine initialized');
    }

    // --- Registry ---

    public createCredentialType(caller: string, input: CreateCredentialTypeInput): number {
        return this.atomically('createCredentialType', () =>
            this.registry.createCredentialType(toAddress(caller, 'caller'), input)
        );
    }

    // --- Access control ---

    public addMinter(caller: string, minter: string): void {
        this.atomically('addMinter', () => this.access.addMinter(toAddress(caller, 'caller'), toAddress(minter, 'minter')));
    }

    public removeMinter(caller: string, minter: string): void {
        this.atomically('removeMinter', () => this.access.removeMinter(toAddress(caller, 'caller'), toAddress(minter, 'minter')));
    }

    public setSigner(caller: string, signer: string): void {
        this.atomically('setSigner', () => this.access.setSigner(toAddress(caller, 'caller'), signer));
    }

    public setTreasury(caller: string, treasury: string): void {
        this.atomically('setTreasury', () => this.access.setTreasury(toAddress(caller, 'caller'), treasury));
    }

    public setBaseMetadataURI(caller: string, baseURI: string): void {
        this.atomically('setBaseMetadataURI', () => this.access.setBaseMetadataURI(toAddress(caller, 'caller'), baseURI));
    }

    public pause(caller: string): void {
        this.atomically('pause', () => this.access.pause(toAddress(caller, 'caller')));
    }

    public unpause(caller: string): void {
        this.atomically('unpause', () => this.access.unpause(toAddress(caller, 'caller')));
    }

    public transferOwnership(caller: string, newOwner: string): void {
        this.atomically('transferOwnership', () => this.access.transferOwnership(toAddress(caller, 'caller'), newOwner));
    }

    public acceptOwnership(caller: string): void {
        this.atomically('acceptOwnership', () => this.access.acceptOwnership(toAddress(caller, 'caller')));
    }

    // --- Issuance ---

    public mint(caller: string, request: MintRequest): IssuanceReceipt {
        return this.atomically('mint', () => {
            const operator = toAddress(caller, 'caller');
            const receipt = this.issuance.mint(operator, {
                ...request,
                to: toNonZeroAddress(request.to, 'to')
            });
            this.forwarder.forward(operator, receipt.value);
            return receipt;
        });
    }

    // --- Burn, approvals, transfers ---

    /**
     * Not pause-gated: holders can always shed credentials.
     */
    public burn(caller: string, holder: string, credentialTypeId: number, amount: bigint): void {
        this.burnBatch(caller, holder, [credentialTypeId], [amount]);
    }

    public burnBatch(caller: string, holder: string, credentialTypeIds: readonly number[], amounts: readonly bigint[]): void {
        this.atomically('burnBatch', () => {
            const operator = toAddress(caller, 'caller');
            const from = toNonZeroAddress(holder, 'holder');
            this.requireHolderOrOperator(operator, from);
            if (credentialTypeIds.length !== amounts.length) {
                throw new InvariantViolationError('LENGTH_MISMATCH', 'credentialTypeIds and amounts length mismatch');
            }

            this.ledger.move({ operator, from, to: null, ids: credentialTypeIds, amounts });
            this.journal.append('CREDENTIALS_BURNED', {
                operator,
                holder: from,
                credentialTypeIds: [...credentialTypeIds],
                amounts: amounts.map((amount) => amount.toString())
            });
            logger.info({ operator, holder: from, credentialTypeIds }, 'Credentials burned');
        });
    }

    public setApprovalForAll(caller: string, operator: string, approved: boolean): void {
        this.atomically('setApprovalForAll', () => {
            const holder = toAddress(caller, 'caller');
            const target = toNonZeroAddress(operator, 'operator');
            if (holder === target) {
                throw new InputValidationError('A holder cannot set approval for itself');
            }
            this.ledger.setApprovalForAll(holder, target, approved);
            this.journal.append('APPROVAL_FOR_ALL', { holder, operator: target, approved });
        });
    }

    public safeTransferFrom(caller: string, from: string, to: string, credentialTypeId: number, amount: bigint): void {
        this.safeBatchTransferFrom(caller, from, to, [credentialTypeId], [amount]);
    }

    /**
     * Rejected with NON_TRANSFERABLE by the ledger guard unless the caller holds
     * the recovery role; the owner still needs the holder's approval here.
     */
    public safeBatchTransferFrom(
        caller: string,
        from: string,
        to: string,
        credentialTypeIds: readonly number[],
        amounts: readonly bigint[]
    ): void {
        this.atomically('safeBatchTransferFrom', () => {
            const operator = toAddress(caller, 'caller');
            const source = toNonZeroAddress(from, 'from');
            const destination = toNonZeroAddress(to, 'to');
            if (this.access.isRecoveryRole(operator)) {
                this.requireHolderOrOperator(operator, source);
            }
            this.ledger.move({ operator, from: source, to: destination, ids: credentialTypeIds, amounts });
        });
    }

    // --- Recovery ---

    public recover(caller: string, oldHolder: string, newHolder: string): RecoveryReceipt {
        return this.atomically('recover', () =>
            this.recovery.recover(
                toAddress(caller, 'caller'),
                toNonZeroAddress(oldHolder, 'oldHolder'),
                toNonZeroAddress(newHolder, 'newHolder')
            )
        );
    }

    // --- Value ---

    /**
     * Value sent without a matching operation goes straight to the treasury.
     */
    public receiveValue(from: string, amount: bigint): void {
        this.atomically('receiveValue', () => this.forwarder.forward(toAddress(from, 'from'), amount));
    }

    // --- Reads ---

    public isCreated(credentialTypeId: number): boolean {
        return this.registry.isCreated(credentialTypeId);
    }

    public getMetadata(credentialTypeId: number): CredentialType {
        return this.registry.getMetadata(credentialTypeId);
    }

    public uri(credentialTypeId: number): string {
        return this.registry.uri(credentialTypeId);
    }

    public credentialTypeCount(): number {
        return this.registry.count();
    }

    public isMintable(credentialTypeId: number): boolean {
        return this.issuance.isMintable(credentialTypeId);
    }

    public isMinter(account: string): boolean {
        return this.access.isMinter(toAddress(account, 'account'));
    }

    public balanceOf(holder: string, credentialTypeId: number): bigint {
        return this.ledger.balanceOf(toAddress(holder, 'holder'), credentialTypeId);
    }

    public balanceOfBatch(holders: readonly string[], credentialTypeIds: readonly number[]): bigint[] {
        return this.ledger.balanceOfBatch(holders.map((holder) => toAddress(holder, 'holder')), credentialTypeIds);
    }

    public totalSupply(credentialTypeId: number): bigint {
        return this.ledger.totalSupply(credentialTypeId);
    }

    public isApprovedForAll(holder: string, operator: string): boolean {
        return this.ledger.isApprovedForAll(toAddress(holder, 'holder'), toAddress(operator, 'operator'));
    }

    public nonceOf(holder: string): bigint {
        return this.nonces.nonceOf(toAddress(holder, 'holder'));
    }

    public owner(): Address {
        return this.access.getOwner();
    }

    public pendingOwner(): Address | null {
        return this.access.getPendingOwner();
    }

    public signer(): Address | null {
        return this.access.getSigner();
    }

    public treasury(): Address | null {
        return this.access.getTreasury();
    }

    public paused(): boolean {
        return this.access.isPaused();
    }

    public baseMetadataURI(): string {
        return this.access.getBaseMetadataURI();
    }

    public get authorizationMode(): AuthorizationMode {
        return this.issuance.mode;
    }

    public events(): readonly CredentialEventRecord[] {
        return this.journal.records();
    }

    public eventsSince(fromSequence: number): readonly CredentialEventRecord[] {
        return this.journal.since(fromSequence);
    }

    // --- Internals ---

    private requireHolderOrOperator(operator: Address, holder: Address): void {
        if (operator !== holder && !this.ledger.isApprovedForAll(holder, operator)) {
            throw new AuthorizationError(
                'NOT_HOLDER_OR_OPERATOR',
                `${operator} is neither ${holder} nor an approved operator`
            );
        }
    }

    private atomically<T>(operation: string, fn: () => T): T {
        return this.guard.run(operation, () => {
            const snapshot = {
                journal: this.journal.checkpoint(),
                access: this.access.checkpoint(),
                registry: this.registry.checkpoint(),
                ledger: this.ledger.checkpoint(),
                nonces: this.nonces.checkpoint()
            };
            try {
                return fn();
            } catch (err) {
                this.nonces.rollback(snapshot.nonces);
                this.ledger.rollback(snapshot.ledger);
                this.registry.rollback(snapshot.registry);
                this.access.rollback(snapshot.access);
                this.journal.rollback(snapshot.journal);
                throw err;
            }
        });
    }
}
