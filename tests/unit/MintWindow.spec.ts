/**
 * Unit Tests: Mint Windows
 *
 * @see libs/issuance/issuanceEngine.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ManualClock } from '../../libs/clock/clock.js';
import { SoulboundCredentialEngine } from '../../libs/engine/SoulboundCredentialEngine.js';
import { WindowError } from '../../libs/errors/credentialErrors.js';
import { mintWindowStatus } from '../../libs/issuance/issuanceEngine.js';
import { ALICE, BOB, MINTER, OWNER, createEngine, errorCode } from './fixtures.js';

const T = 10_000;

describe('mintWindowStatus', () => {
    const type = {
        id: 0, name: 'W', description: '', creator: OWNER, createdAt: 0,
        startTime: T, endTime: T + 100, price: 0n
    };

    it('should open at the start time inclusive and close at the end time exclusive', () => {
        assert.strictEqual(mintWindowStatus(type, T - 1), 'NOT_STARTED');
        assert.strictEqual(mintWindowStatus(type, T), 'OPEN');
        assert.strictEqual(mintWindowStatus(type, T + 99), 'OPEN');
        assert.strictEqual(mintWindowStatus(type, T + 100), 'ENDED');
    });

    it('should never end when the end time is zero', () => {
        assert.strictEqual(mintWindowStatus({ ...type, endTime: 0 }, Number.MAX_SAFE_INTEGER), 'OPEN');
    });
});

describe('Mint windows end to end', () => {
    let engine: SoulboundCredentialEngine;
    let clock: ManualClock;

    beforeEach(() => {
        ({ engine, clock } = createEngine());
        engine.createCredentialType(OWNER, { name: 'Always', description: '', startTime: 0, endTime: 0 });
        engine.createCredentialType(OWNER, { name: 'Event', description: '', startTime: T, endTime: T + 100 });
        engine.addMinter(OWNER, MINTER);
    });

    it('should follow the window of each type', () => {
        clock.set(T - 1);
        assert.throws(() => engine.mint(MINTER, { to: ALICE, credentialTypeId: 1 }), (err: unknown) =>
            err instanceof WindowError && err.code === 'NOT_STARTED' && err.credentialTypeId === 1 && err.now === T - 1
        );
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 0 });

        clock.set(T + 50);
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 1 });
        assert.strictEqual(engine.balanceOf(ALICE, 1), 1n);

        clock.set(T + 150);
        assert.throws(() => engine.mint(MINTER, { to: BOB, credentialTypeId: 1 }), errorCode('ENDED'));
        assert.strictEqual(engine.balanceOf(BOB, 1), 0n);

        engine.mint(MINTER, { to: BOB, credentialTypeId: 0 });
        assert.strictEqual(engine.balanceOf(BOB, 0), 1n);
    });

    it('should accept a mint exactly at the start time', () => {
        clock.set(T);
        engine.mint(MINTER, { to: ALICE, credentialTypeId: 1 });
        assert.strictEqual(engine.balanceOf(ALICE, 1), 1n);
    });

    it('should reject a mint exactly at the end time', () => {
        clock.set(T + 100);
        assert.throws(() => engine.mint(MINTER, { to: ALICE, credentialTypeId: 1 }), errorCode('ENDED'));
    });

    it('should check the window before the caller\'s role', () => {
        clock.set(T - 1);
        assert.throws(() => engine.mint(ALICE, { to: ALICE, credentialTypeId: 1 }), errorCode('NOT_STARTED'));
    });

    it('should report mintability from the clock', () => {
        clock.set(T - 1);
        assert.strictEqual(engine.isMintable(1), false);
        clock.set(T);
        assert.strictEqual(engine.isMintable(1), true);
        clock.set(T + 100);
        assert.strictEqual(engine.isMintable(1), false);
        assert.strictEqual(engine.isMintable(0), true);
    });

    it('should expose the window in the metadata', () => {
        const metadata = engine.getMetadata(1);
        assert.strictEqual(metadata.startTime, T);
        assert.strictEqual(metadata.endTime, T + 100);
    });
});
