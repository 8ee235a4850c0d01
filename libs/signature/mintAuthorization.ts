/**
 * Signed Mint Authorization Protocol
 *
 * Canonical message:
 *   keccak256(abi.encodePacked(
 *       address recipient, uint256 credentialTypeId, uint256 requiredPrice,
 *       uint256 deadline, uint256 domainId, uint256 nonce))
 *
 * The 32-byte digest is signed as an EIP-191 personal message. The nonce and
 * domain id never travel with the authorization: the verifier supplies the
 * recipient's current nonce and its own domain id, so a signature is bound to
 * one deployment and usable exactly once.
 */

import { getBytes, solidityPackedKeccak256, verifyMessage } from 'ethers';
import { Address, toAddress } from '../identity/address.js';
import { AuthorizationError } from '../errors/credentialErrors.js';

export interface MintAuthorization {
    readonly recipient: Address;
    readonly credentialTypeId: number;
    readonly requiredPrice: bigint;
    /** Last second (inclusive) at which the authorization is usable */
    readonly deadline: number;
    readonly signature: string;
}

export interface MintAuthorizationMessage {
    readonly recipient: Address;
    readonly credentialTypeId: number;
    readonly requiredPrice: bigint;
    readonly deadline: number;
    readonly domainId: bigint;
    readonly nonce: bigint;
}

export const MINT_AUTHORIZATION_TYPES = [
    'address',
    'uint256',
    'uint256',
    'uint256',
    'uint256',
    'uint256'
] as const;

export function mintAuthorizationDigest(message: MintAuthorizationMessage): string {
    return solidityPackedKeccak256(
        [...MINT_AUTHORIZATION_TYPES],
        [
            message.recipient,
            message.credentialTypeId,
            message.requiredPrice,
            message.deadline,
            message.domainId,
            message.nonce
        ]
    );
}

/**
 * Recovers the address that signed the digest, or null when the signature
 * is malformed.
 */
export function recoverAuthorizationSigner(digest: string, signature: string): Address | null {
    try {
        return toAddress(verifyMessage(getBytes(digest), signature));
    } catch {
        return null;
    }
}

export interface VerificationContext {
    readonly trustedSigner: Address | null;
    readonly domainId: bigint;
    readonly nonce: bigint;
    readonly now: number;
}

/**
 * Checks expiry first so a stale authorization is reported as EXPIRED even
 * when its signature would also fail. A deadline outside the safe integer
 * range cannot be encoded into the digest and is rejected before that.
 */
export function verifyMintAuthorization(authorization: MintAuthorization, context: VerificationContext): void {
    if (!Number.isSafeInteger(authorization.deadline) || authorization.deadline < 0) {
        throw new AuthorizationError(
            'INVALID_SIGNATURE',
            `Mint authorization deadline ${authorization.deadline} is not a valid timestamp`
        );
    }
    if (authorization.deadline < context.now) {
        throw new AuthorizationError(
            'EXPIRED',
            `Mint authorization expired at ${authorization.deadline} (now ${context.now})`
        );
    }

    const digest = mintAuthorizationDigest({
        recipient: authorization.recipient,
        credentialTypeId: authorization.credentialTypeId,
        requiredPrice: authorization.requiredPrice,
        deadline: authorization.deadline,
        domainId: context.domainId,
        nonce: context.nonce
    });
    const recovered = recoverAuthorizationSigner(digest, authorization.signature);

    if (context.trustedSigner === null || recovered === null || recovered !== context.trustedSigner) {
        throw new AuthorizationError('INVALID_SIGNATURE', 'Mint authorization was not signed by the trusted signer');
    }
}
