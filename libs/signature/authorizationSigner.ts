import { getBytes, Wallet } from 'ethers';
import { Address, toNonZeroAddress } from '../identity/address.js';
import { getComponentLogger } from '../logging/logger.js';
import { MintAuthorization, mintAuthorizationDigest } from './mintAuthorization.js';

const logger = getComponentLogger('MintAuthorizationSigner');

export interface AuthorizationRequest {
    recipient: Address;
    credentialTypeId: number;
    requiredPrice: bigint;
    deadline: number;
    /** Recipient's current nonce as read from the engine */
    nonce: bigint;
}

/**
 * Signer-service side of the mint authorization protocol.
 * Holds the trusted signer's key; the engine only ever sees its address.
 */
export class MintAuthorizationSigner {
    private readonly wallet: Wallet;

    constructor(privateKey: string, private readonly domainId: bigint) {
        this.wallet = new Wallet(privateKey);
    }

    public get address(): Address {
        return this.wallet.address;
    }

    public async sign(request: AuthorizationRequest): Promise<MintAuthorization> {
        const recipient = toNonZeroAddress(request.recipient, 'recipient');
        const digest = mintAuthorizationDigest({
            recipient,
            credentialTypeId: request.credentialTypeId,
            requiredPrice: request.requiredPrice,
            deadline: request.deadline,
            domainId: this.domainId,
            nonce: request.nonce
        });
        const signature = await this.wallet.signMessage(getBytes(digest));

        logger.info({
            recipient,
            credentialTypeId: request.credentialTypeId,
            deadline: request.deadline,
            nonce: request.nonce.toString()
        }, 'Mint authorization signed');

        return {
            recipient,
            credentialTypeId: request.credentialTypeId,
            requiredPrice: request.requiredPrice,
            deadline: request.deadline,
            signature
        };
    }
}
