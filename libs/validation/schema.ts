import { z } from 'zod';
import { getAddress, isAddress } from 'ethers';

/**
 * Input Validation Framework
 * Schemas for every request body and path parameter the HTTP surface accepts.
 */

// --- Primitives ---

export const AddressSchema = z.string()
    .refine((value) => isAddress(value), { message: 'Invalid address' })
    .transform((value) => getAddress(value));

/** uint256-style quantity as a decimal string (or safe integer) */
export const UintSchema = z.union([
    z.string().regex(/^\d{1,78}$/),
    z.number().int().nonnegative()
]).transform((value) => BigInt(value));

export const TimestampSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const CredentialTypeIdSchema = z.number().int().nonnegative();

export const CredentialTypeIdParamSchema = z.coerce.number().int().nonnegative();

export const SequenceParamSchema = z.coerce.number().int().nonnegative();

export const SignatureSchema = z.string().regex(/^0x[0-9a-fA-F]{130}$/);

// --- Registry ---

export const CreateCredentialTypeSchema = z.object({
    name: z.string().min(1).max(128),
    description: z.string().max(2048).default(''),
    startTime: TimestampSchema.default(0),
    endTime: TimestampSchema.default(0),
    price: UintSchema.optional(),
}).strict();

// --- Issuance ---

export const MintAuthorizationSchema = z.object({
    recipient: AddressSchema,
    credentialTypeId: CredentialTypeIdSchema,
    requiredPrice: UintSchema,
    deadline: TimestampSchema,
    signature: SignatureSchema,
}).strict();

export const MintRequestSchema = z.object({
    to: AddressSchema,
    credentialTypeId: CredentialTypeIdSchema,
    value: UintSchema.optional(),
    authorization: MintAuthorizationSchema.optional(),
}).strict();

// --- Burn / approvals / recovery ---

export const BurnRequestSchema = z.object({
    holder: AddressSchema,
    credentialTypeId: CredentialTypeIdSchema,
    amount: UintSchema,
}).strict();

export const BurnBatchRequestSchema = z.object({
    holder: AddressSchema,
    credentialTypeIds: z.array(CredentialTypeIdSchema).min(1),
    amounts: z.array(UintSchema).min(1),
}).strict().refine((body) => body.credentialTypeIds.length === body.amounts.length, {
    message: 'credentialTypeIds and amounts must have the same length'
});

export const TransferRequestSchema = z.object({
    from: AddressSchema,
    to: AddressSchema,
    credentialTypeIds: z.array(CredentialTypeIdSchema).min(1),
    amounts: z.array(UintSchema).min(1),
}).strict().refine((body) => body.credentialTypeIds.length === body.amounts.length, {
    message: 'credentialTypeIds and amounts must have the same length'
});

export const ApprovalRequestSchema = z.object({
    operator: AddressSchema,
    approved: z.boolean(),
}).strict();

export const RecoverRequestSchema = z.object({
    oldHolder: AddressSchema,
    newHolder: AddressSchema,
}).strict();

export const ValueRequestSchema = z.object({
    amount: UintSchema,
}).strict();

export const BalanceBatchQuerySchema = z.object({
    holders: z.string().min(1).transform((value) => value.split(',')).pipe(z.array(AddressSchema)),
    ids: z.string().min(1).transform((value) => value.split(',')).pipe(z.array(CredentialTypeIdParamSchema)),
}).refine((query) => query.holders.length === query.ids.length, {
    message: 'holders and ids must have the same length'
});

// --- Administration ---

export const AccountRequestSchema = z.object({
    account: AddressSchema,
}).strict();

export const BaseUriRequestSchema = z.object({
    baseURI: z.string().max(2048),
}).strict();

export type CreateCredentialTypeBody = z.infer<typeof CreateCredentialTypeSchema>;
export type MintRequestBody = z.infer<typeof MintRequestSchema>;
