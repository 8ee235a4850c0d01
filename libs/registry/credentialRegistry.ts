/**
 * Credential Registry
 *
 * Stores per-type metadata. Ids are dense, start at 0 and come from a single
 * counter; there is no update or delete path. Whether a type is currently
 * mintable is decided by the issuance engine, not here.
 */

import { Address } from '../identity/address.js';
import { Clock } from '../clock/clock.js';
import { AccessControl } from '../access/accessControl.js';
import { EventJournal } from '../events/eventJournal.js';
import { InvariantViolationError, NotFoundError, ValueError } from '../errors/credentialErrors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('CredentialRegistry');

export interface CredentialType {
    readonly id: number;
    readonly name: string;
    readonly description: string;
    readonly creator: Address;
    readonly createdAt: number;
    readonly startTime: number;
    /** 0 means the mint window never closes */
    readonly endTime: number;
    readonly price: bigint;
}

export interface CreateCredentialTypeInput {
    name: string;
    description: string;
    startTime: number;
    endTime: number;
    price?: bigint;
}

export interface RegistrySnapshot {
    readonly length: number;
}

export class CredentialRegistry {
    private readonly types: CredentialType[] = [];

    constructor(
        private readonly access: AccessControl,
        private readonly journal: EventJournal,
        private readonly clock: Clock
    ) { }

    public createCredentialType(caller: Address, input: CreateCredentialTypeInput): number {
        this.access.requireOwner(caller);
        this.access.requireNotPaused();

        const price = input.price ?? 0n;
        if (!Number.isSafeInteger(input.startTime) || input.startTime < 0
            || !Number.isSafeInteger(input.endTime) || input.endTime < 0) {
            throw new InvariantViolationError('INVALID_WINDOW', 'Mint window bounds must be non-negative integer timestamps');
        }
        if (input.endTime !== 0 && input.endTime <= input.startTime) {
            throw new InvariantViolationError(
                'INVALID_WINDOW',
                `Mint window end ${input.endTime} must be after start ${input.startTime}`
            );
        }
        if (price < 0n) {
            throw new ValueError('INVALID_AMOUNT', 'Price must not be negative');
        }

        const id = this.types.length;
        const record: CredentialType = Object.freeze({
            id,
            name: input.name,
            description: input.description,
            creator: caller,
            createdAt: this.clock.now(),
            startTime: input.startTime,
            endTime: input.endTime,
            price
        });
        this.types.push(record);

        this.journal.append('CREDENTIAL_TYPE_CREATED', {
            credentialTypeId: id,
            name: record.name,
            creator: caller,
            startTime: record.startTime,
            endTime: record.endTime,
            price: price.toString()
        });
        logger.info({ credentialTypeId: id, name: record.name }, 'Credential type created');

        return id;
    }

    public isCreated(id: number): boolean {
        return Number.isInteger(id) && id >= 0 && id < this.types.length;
    }

    public getMetadata(id: number): CredentialType {
        const record = this.isCreated(id) ? this.types[id] : undefined;
        if (!record) {
            throw new NotFoundError(id);
        }
        return record;
    }

    /**
     * The next unused id; every id below it is created.
     */
    public count(): number {
        return this.types.length;
    }

    public uri(id: number): string {
        this.getMetadata(id);
        const base = this.access.getBaseMetadataURI();
        return base === '' ? '' : `${base}${id.toString(10)}`;
    }

    public checkpoint(): RegistrySnapshot {
        return { length: this.types.length };
    }

    public rollback(snapshot: RegistrySnapshot): void {
        this.types.length = snapshot.length;
    }
}
