/**
 * Soulbound Credential Engine public surface.
 */

export type { EngineConfig, EngineDependencies } from './SoulboundCredentialEngine.js';
export { SoulboundCredentialEngine } from './SoulboundCredentialEngine.js';

export type { Address } from '../identity/address.js';
export type { Clock } from '../clock/clock.js';
export { SystemClock, ManualClock } from '../clock/clock.js';

export type { CredentialType, CreateCredentialTypeInput } from '../registry/credentialRegistry.js';
export type { AuthorizationMode, MintRequest, IssuanceReceipt, MintWindowStatus } from '../issuance/issuanceEngine.js';
export { mintWindowStatus } from '../issuance/issuanceEngine.js';
export type { RecoveryReceipt, RecoveredBalance } from '../recovery/recoveryOperation.js';

export type { BalanceLedger, LedgerHooks, LedgerMovement } from '../ledger/balanceLedger.js';
export { InMemoryBalanceLedger } from '../ledger/inMemoryBalanceLedger.js';
export type { ValueTransport } from '../treasury/treasury.js';
export { InMemoryValueTransport } from '../treasury/treasury.js';

export type { MintAuthorization, MintAuthorizationMessage } from '../signature/mintAuthorization.js';
export { mintAuthorizationDigest, verifyMintAuthorization } from '../signature/mintAuthorization.js';
export { MintAuthorizationSigner } from '../signature/authorizationSigner.js';

export type { CredentialEventRecord, CredentialEventType } from '../events/schema.js';
export { verifyEventChain } from '../events/integrity.js';

export * from '../errors/credentialErrors.js';
