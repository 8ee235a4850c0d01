/**
 * Unit Tests: Global Pause
 *
 * @see libs/access/accessControl.ts
 * @see libs/engine/SoulboundCredentialEngine.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { SoulboundCredentialEngine } from '../../libs/engine/SoulboundCredentialEngine.js';
import { ALICE, BOB, MINTER, OWNER, STRANGER, createEngine, errorCode } from './fixtures.js';

describe('Pause semantics', () => {
    let engine: SoulboundCredentialEngine;

    beforeEach(() => {
        ({ engine } = createEngine());
        engine.createCredentialType(OWNER, { name: 'T0', description: '', startTime: 0, endTime: 0 });
        engine.addMinter(OWNER, MINTER);
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 });
        engine.pause(OWNER);
    });

    it('should block registry creation, minter edits and minting', () => {
        assert.throws(
            () => engine.createCredentialType(OWNER, { name: 'T1', description: '', startTime: 0, endTime: 0 }),
            errorCode('PAUSED')
        );
        assert.throws(() => engine.addMinter(OWNER, BOB), errorCode('PAUSED'));
        assert.throws(() => engine.removeMinter(OWNER, MINTER), errorCode('PAUSED'));
        assert.throws(() => engine.mint(MINTER, { to: BOB, credentialTypeId: 0 }), errorCode('PAUSED'));
        assert.strictEqual(engine.credentialTypeCount(), 1);
    });

    it('should report the pause before any other mint precondition', () => {
        assert.throws(() => engine.mint(STRANGER, { to: BOB, credentialTypeId: 99 }), errorCode('PAUSED'));
    });

    it('should keep burn available to holders', () => {
        engine.burn(ALICE, ALICE, 0, 1n);
        assert.strictEqual(engine.balanceOf(ALICE, 0), 0n);
    });

    it('should keep reads available', () => {
        assert.strictEqual(engine.paused(), true);
        assert.strictEqual(engine.isCreated(0), true);
        assert.strictEqual(engine.isMinter(MINTER), true);
        assert.strictEqual(engine.balanceOf(ALICE, 0), 1n);
        assert.strictEqual(engine.isMintable(0), false);
    });

    it('should resume minting after unpause', () => {
        engine.unpause(OWNER);
        engine.mint(MINTER, { to: BOB, credentialTypeId: 0 });
        assert.strictEqual(engine.balanceOf(BOB, 0), 1n);
        assert.strictEqual(engine.isMintable(0), true);
    });

    it('should journal both toggles', () => {
        engine.unpause(OWNER);
        const types = engine.events().slice(-2).map((record) => record.eventType);
        assert.deepStrictEqual(types, ['PAUSED', 'UNPAUSED']);
    });
});
