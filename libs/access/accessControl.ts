/**
 * Access Control Layer
 *
 * Holds the owner (two-step transfer), the pause switch, the minter set and
 * the privileged configuration fields (trusted signer, treasury, metadata
 * base URI). Every check takes the caller identity explicitly.
 */

import { Address, sameAddress, toNonZeroAddress } from '../identity/address.js';
import { AuthorizationError, InvariantViolationError, StateError } from '../errors/credentialErrors.js';
import { EventJournal } from '../events/eventJournal.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('AccessControl');

export interface AccessControlConfig {
    owner: Address;
    signer?: Address | null;
    treasury?: Address | null;
    baseMetadataURI?: string;
}

export interface AccessControlSnapshot {
    readonly owner: Address;
    readonly pendingOwner: Address | null;
    readonly paused: boolean;
    readonly minters: ReadonlySet<Address>;
    readonly signer: Address | null;
    readonly treasury: Address | null;
    readonly baseMetadataURI: string;
}

export class AccessControl {
    private owner: Address;
    private pendingOwner: Address | null = null;
    private paused = false;
    private minters = new Set<Address>();
    private signer: Address | null;
    private treasury: Address | null;
    private baseMetadataURI: string;

    constructor(config: AccessControlConfig, private readonly journal: EventJournal) {
        this.owner = toNonZeroAddress(config.owner, 'owner');
        this.signer = config.signer ? toNonZeroAddress(config.signer, 'signer') : null;
        this.treasury = config.treasury ? toNonZeroAddress(config.treasury, 'treasury') : null;
        this.baseMetadataURI = config.baseMetadataURI ?? '';
    }

    // --- Guards ---

    public requireOwner(caller: Address): void {
        if (!sameAddress(caller, this.owner)) {
            logger.warn({ caller }, 'Owner-only operation denied');
            throw new AuthorizationError('NOT_OWNER', `Caller ${caller} is not the owner`);
        }
    }

    public requireNotPaused(): void {
        if (this.paused) {
            throw new StateError('PAUSED', 'Engine is paused');
        }
    }

    public requireMinter(caller: Address): void {
        if (!this.minters.has(caller)) {
            logger.warn({ caller }, 'Mint denied: caller is not a minter');
            throw new AuthorizationError('NOT_MINTER', `Caller ${caller} is not a minter`);
        }
    }

    /**
     * Recovery, and any ledger move outside mint/burn, is reserved to the owner.
     */
    public isRecoveryRole(caller: Address): boolean {
        return sameAddress(caller, this.owner);
    }

    // --- Ownership ---

    public transferOwnership(caller: Address, newOwner: Address): void {
        this.requireOwner(caller);
        const pending = toNonZeroAddress(newOwner, 'newOwner');
        this.pendingOwner = pending;
        this.journal.append('OWNERSHIP_TRANSFER_STARTED', { previousOwner: this.owner, pendingOwner: pending });
        logger.info({ owner: this.owner, pendingOwner: pending }, 'Ownership transfer started');
    }

    public acceptOwnership(caller: Address): void {
        if (!sameAddress(caller, this.pendingOwner)) {
            throw new AuthorizationError('NOT_PENDING_OWNER', `Caller ${caller} is not the pending owner`);
        }
        const previousOwner = this.owner;
        this.owner = caller;
        this.pendingOwner = null;
        this.journal.append('OWNERSHIP_TRANSFERRED', { previousOwner, newOwner: caller });
        logger.info({ previousOwner, newOwner: caller }, 'Ownership transferred');
    }

    // --- Pause ---

    public pause(caller: Address): void {
        this.requireOwner(caller);
        this.requireNotPaused();
        this.paused = true;
        this.journal.append('PAUSED', { account: caller });
        logger.info({ caller }, 'Engine paused');
    }

    public unpause(caller: Address): void {
        this.requireOwner(caller);
        if (!this.paused) {
            throw new StateError('NOT_PAUSED', 'Engine is not paused');
        }
        this.paused = false;
        this.journal.append('UNPAUSED', { account: caller });
        logger.info({ caller }, 'Engine unpaused');
    }

    // --- Minter set ---

    public addMinter(caller: Address, minter: Address): void {
        this.requireOwner(caller);
        this.requireNotPaused();
        const account = toNonZeroAddress(minter, 'minter');
        if (this.minters.has(account)) {
            throw new InvariantViolationError('MINTER_EXISTS', `${account} is already a minter`);
        }
        this.minters.add(account);
        this.journal.append('MINTER_ADDED', { minter: account });
        logger.info({ minter: account }, 'Minter added');
    }

    public removeMinter(caller: Address, minter: Address): void {
        this.requireOwner(caller);
        this.requireNotPaused();
        const account = toNonZeroAddress(minter, 'minter');
        if (!this.minters.has(account)) {
            throw new InvariantViolationError('MINTER_MISSING', `${account} is not a minter`);
        }
        this.minters.delete(account);
        this.journal.append('MINTER_REMOVED', { minter: account });
        logger.info({ minter: account }, 'Minter removed');
    }

    // --- Privileged configuration ---

    /**
     * Not pause-gated: rotating a compromised signer must stay possible.
     */
    public setSigner(caller: Address, signer: Address): void {
        this.requireOwner(caller);
        const next = toNonZeroAddress(signer, 'signer');
        const previousSigner = this.signer;
        this.signer = next;
        this.journal.append('SIGNER_UPDATED', { previousSigner, signer: next });
        logger.info({ previousSigner, signer: next }, 'Trusted signer rotated');
    }

    public setTreasury(caller: Address, treasury: Address): void {
        this.requireOwner(caller);
        this.requireNotPaused();
        const next = toNonZeroAddress(treasury, 'treasury');
        const previousTreasury = this.treasury;
        this.treasury = next;
        this.journal.append('TREASURY_UPDATED', { previousTreasury, treasury: next });
        logger.info({ previousTreasury, treasury: next }, 'Treasury rotated');
    }

    public setBaseMetadataURI(caller: Address, baseURI: string): void {
        this.requireOwner(caller);
        this.requireNotPaused();
        this.baseMetadataURI = baseURI;
        this.journal.append('BASE_URI_UPDATED', { baseURI });
    }

    // --- Reads ---

    public getOwner(): Address {
        return this.owner;
    }

    public getPendingOwner(): Address | null {
        return this.pendingOwner;
    }

    public isPaused(): boolean {
        return this.paused;
    }

    public isMinter(account: Address): boolean {
        return this.minters.has(account);
    }

    public getSigner(): Address | null {
        return this.signer;
    }

    public getTreasury(): Address | null {
        return this.treasury;
    }

    public getBaseMetadataURI(): string {
        return this.baseMetadataURI;
    }

    // --- Atomicity ---

    public checkpoint(): AccessControlSnapshot {
        return {
            owner: this.owner,
            pendingOwner: this.pendingOwner,
            paused: this.paused,
            minters: new Set(this.minters),
            signer: this.signer,
            treasury: this.treasury,
            baseMetadataURI: this.baseMetadataURI
        };
    }

    public rollback(snapshot: AccessControlSnapshot): void {
        this.owner = snapshot.owner;
        this.pendingOwner = snapshot.pendingOwner;
        this.paused = snapshot.paused;
        this.minters = new Set(snapshot.minters);
        this.signer = snapshot.signer;
        this.treasury = snapshot.treasury;
        this.baseMetadataURI = snapshot.baseMetadataURI;
    }
}
