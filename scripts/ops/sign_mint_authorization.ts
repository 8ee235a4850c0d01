/**
 * Mint Authorization Signing Tool
 *
 * Signs one mint authorization with the trusted signer key and prints it as
 * the JSON the credential API accepts in a mint request.
 *
 * Usage:
 *   SIGNER_PRIVATE_KEY=0x... DOMAIN_ID=1 \
 *     tsx scripts/ops/sign_mint_authorization.ts \
 *       --recipient 0x... --credential-type 0 --price 0 --deadline 1700000000 --nonce 0
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { MintAuthorizationSigner } from "../../libs/signature/authorizationSigner.js";
import { AddressSchema, UintSchema } from "../../libs/validation/schema.js";
import { validate } from "../../libs/validation/zod-middleware.js";

const SigningInputSchema = z.object({
    privateKey: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "SIGNER_PRIVATE_KEY must be a 32-byte hex key"),
    domainId: UintSchema,
    recipient: AddressSchema,
    credentialTypeId: z.coerce.number().int().nonnegative(),
    requiredPrice: UintSchema,
    deadline: z.coerce.number().int().nonnegative(),
    nonce: UintSchema,
});

async function signMintAuthorization() {
    const { values } = parseArgs({
        options: {
            recipient: { type: "string" },
            "credential-type": { type: "string" },
            price: { type: "string", default: "0" },
            deadline: { type: "string" },
            nonce: { type: "string", default: "0" },
        },
    });

    const input = validate(SigningInputSchema, {
        privateKey: process.env.SIGNER_PRIVATE_KEY,
        domainId: process.env.DOMAIN_ID,
        recipient: values.recipient,
        credentialTypeId: values["credential-type"],
        requiredPrice: values.price,
        deadline: values.deadline,
        nonce: values.nonce,
    }, "SignMintAuthorization");

    const signer = new MintAuthorizationSigner(input.privateKey, input.domainId);
    const authorization = await signer.sign({
        recipient: input.recipient,
        credentialTypeId: input.credentialTypeId,
        requiredPrice: input.requiredPrice,
        deadline: input.deadline,
        nonce: input.nonce,
    });

    console.log(JSON.stringify({
        signer: signer.address,
        authorization: {
            recipient: authorization.recipient,
            credentialTypeId: authorization.credentialTypeId,
            requiredPrice: authorization.requiredPrice.toString(),
            deadline: authorization.deadline,
            signature: authorization.signature,
        },
    }, null, 2));
}

signMintAuthorization().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
});
