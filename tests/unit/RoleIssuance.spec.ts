/**
 * Unit Tests: Role-Path Issuance
 *
 * @see libs/issuance/issuanceEngine.ts
 * @see libs/engine/SoulboundCredentialEngine.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { SoulboundCredentialEngine } from '../../libs/engine/SoulboundCredentialEngine.js';
import { InMemoryValueTransport } from '../../libs/treasury/treasury.js';
import { ALICE, BOB, MINTER, OWNER, STRANGER, TREASURY, createEngine, errorCode } from './fixtures.js';

describe('Role-path issuance', () => {
    let engine: SoulboundCredentialEngine;
    let transport: InMemoryValueTransport;

    beforeEach(() => {
        ({ engine, transport } = createEngine());
        engine.createCredentialType(OWNER, { name: 'Member', description: '', startTime: 0, endTime: 0 });
        engine.addMinter(OWNER, MINTER);
    });

    it('should credit exactly one unit to the recipient', () => {
        const receipt = engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 });

        assert.deepStrictEqual(receipt, { to: ALICE, credentialTypeId: 0, value: 0n, path: 'role' });
        assert.strictEqual(engine.balanceOf(ALICE, 0), 1n);
        assert.strictEqual(engine.balanceOf(BOB, 0), 0n);
        assert.strictEqual(engine.totalSupply(0), 1n);
    });

    it('should accept recipients in any letter case', () => {
        const receipt = engine.mint(MINTER.toLowerCase(), { to: ALICE.toLowerCase(), credentialTypeId: 0 });
        assert.strictEqual(receipt.to, ALICE);
        assert.strictEqual(engine.balanceOf(ALICE, 0), 1n);
    });

    it('should emit an issuance record naming recipient, type and value', () => {
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 });
        const issued = engine.events().find((record) => record.eventType === 'CREDENTIAL_ISSUED');
        assert.ok(issued && issued.eventType === 'CREDENTIAL_ISSUED');
        assert.deepStrictEqual(issued.payload, { to: ALICE, credentialTypeId: 0, value: '0', path: 'role' });
    });

    it('should permit minting the same type to the same holder again', () => {
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 });
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 });
        assert.strictEqual(engine.balanceOf(ALICE, 0), 2n);
    });

    it('should reject callers outside the minter set', () => {
        assert.throws(() => engine.mint(STRANGER, { to: ALICE, credentialTypeId: 0 }), errorCode('NOT_MINTER'));
        assert.throws(() => engine.mint(OWNER, { to: ALICE, credentialTypeId: 0 }), errorCode('NOT_MINTER'));
        assert.strictEqual(engine.balanceOf(ALICE, 0), 0n);
    });

    it('should stop a removed minter from minting', () => {
        engine.removeMinter(OWNER, MINTER);
        assert.throws(() => engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 }), errorCode('NOT_MINTER'));
    });

    it('should fail for an uncreated type before checking the role', () => {
        assert.throws(() => engine.mint(STRANGER, { to: ALICE, credentialTypeId: 7 }), errorCode('CREDENTIAL_TYPE_NOT_FOUND'));
    });

    it('should reject the zero address as recipient', () => {
        assert.throws(
            () => engine.mint(MINTER, { to: '0x0000000000000000000000000000000000000000', credentialTypeId: 0 }),
            errorCode('ZERO_ADDRESS')
        );
    });

    it('should reject a signed authorization in role mode', () => {
        assert.throws(() => engine.mint(MINTER, {
            to: ALICE,
            credentialTypeId: 0,
            authorization: { recipient: ALICE, credentialTypeId: 0, requiredPrice: 0n, deadline: 9_999, signature: '0x' }
        }), errorCode('WRONG_AUTHORIZATION_MODE'));
    });

    it('should forward a voluntary donation to the treasury', () => {
        const receipt = engine.mint(MINTER, { to: ALICE, credentialTypeId: 0, value: 42n });

        assert.strictEqual(receipt.value, 42n);
        assert.strictEqual(transport.balanceOf(TREASURY), 42n);
        const forwarded = engine.events().at(-1);
        assert.ok(forwarded && forwarded.eventType === 'VALUE_FORWARDED');
        assert.deepStrictEqual(forwarded.payload, { from: MINTER, treasury: TREASURY, amount: '42' });
    });

    it('should reject a negative value', () => {
        assert.throws(() => engine.mint(MINTER, { to: ALICE, credentialTypeId: 0, value: -1n }), errorCode('INVALID_AMOUNT'));
    });

    it('should report mintability from pause, existence and window', () => {
        assert.strictEqual(engine.isMintable(0), true);
        assert.strictEqual(engine.isMintable(1), false);
        engine.pause(OWNER);
        assert.strictEqual(engine.isMintable(0), false);
    });
});
