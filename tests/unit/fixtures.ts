/**
 * Shared identities and engine builders for the unit suites.
 * Keys are fixed test values; they guard nothing.
 */

import { getAddress, Wallet } from 'ethers';
import { ManualClock } from '../../libs/clock/clock.js';
import { EngineConfig, EngineDependencies, SoulboundCredentialEngine } from '../../libs/engine/SoulboundCredentialEngine.js';
import { MintAuthorizationSigner } from '../../libs/signature/authorizationSigner.js';
import { InMemoryValueTransport } from '../../libs/treasury/treasury.js';

export const OWNER = getAddress('0x' + '0a'.repeat(20));
export const MINTER = getAddress('0x' + '0b'.repeat(20));
export const ALICE = getAddress('0x' + 'a1'.repeat(20));
export const BOB = getAddress('0x' + 'b2'.repeat(20));
export const CAROL = getAddress('0x' + 'c3'.repeat(20));
export const TREASURY = getAddress('0x' + 'd4'.repeat(20));
export const STRANGER = getAddress('0x' + 'e5'.repeat(20));

export const SIGNER_KEY = '0x' + '11'.repeat(32);
export const OTHER_SIGNER_KEY = '0x' + '22'.repeat(32);
export const SIGNER_ADDRESS = new Wallet(SIGNER_KEY).address;
export const DOMAIN_ID = 31337n;

export const START_TIME = 1_000;

export interface EngineHarness {
    engine: SoulboundCredentialEngine;
    clock: ManualClock;
    transport: InMemoryValueTransport;
}

export function createEngine(config: Partial<EngineConfig> = {}, deps: EngineDependencies = {}): EngineHarness {
    const clock = new ManualClock(START_TIME);
    const transport = new InMemoryValueTransport();
    const engine = new SoulboundCredentialEngine(
        {
            owner: OWNER,
            authorizationMode: 'role',
            treasury: TREASURY,
            ...config
        },
        { clock, valueTransport: transport, ...deps }
    );
    return { engine, clock, transport };
}

export function createSignatureEngine(config: Partial<EngineConfig> = {}, deps: EngineDependencies = {}): EngineHarness & {
    signer: MintAuthorizationSigner;
} {
    const harness = createEngine({
        authorizationMode: 'signature',
        domainId: DOMAIN_ID,
        signer: SIGNER_ADDRESS,
        ...config
    }, deps);
    return { ...harness, signer: new MintAuthorizationSigner(SIGNER_KEY, DOMAIN_ID) };
}

/**
 * Matches an engine error by its code, for use with assert.throws / assert.rejects.
 */
export function errorCode(code: string) {
    return (err: unknown): boolean => {
        if (typeof err === 'object' && err !== null && 'code' in err && err.code === code) {
            return true;
        }
        throw err;
    };
}
