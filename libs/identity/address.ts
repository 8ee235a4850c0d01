import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { InputValidationError, InvariantViolationError } from '../errors/credentialErrors.js';

/**
 * Identities are EVM-style addresses held in checksum form.
 */
export type Address = string;

export const ZERO_ADDRESS: Address = ZeroAddress;

/**
 * Normalizes any accepted spelling of an address to its checksum form.
 */
export function toAddress(value: string, label = 'address'): Address {
    if (!isAddress(value)) {
        throw new InputValidationError(`${label} is not a valid address: ${value}`);
    }
    return getAddress(value);
}

/**
 * Like toAddress, but also rejects the zero address.
 */
export function toNonZeroAddress(value: string, label = 'address'): Address {
    const address = toAddress(value, label);
    if (address === ZERO_ADDRESS) {
        throw new InvariantViolationError('ZERO_ADDRESS', `${label} must not be the zero address`);
    }
    return address;
}

export function sameAddress(a: Address | null, b: Address | null): boolean {
    return a !== null && b !== null && a === b;
}
