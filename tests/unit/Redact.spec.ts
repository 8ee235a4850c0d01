/**
 * Unit Tests: Log Redaction
 *
 * @see libs/logging/redactionConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

function captureLogger(lines: string[]) {
    const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            lines.push(chunk.toString());
            callback();
        }
    });

    return pino({
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    }, stream);
}

describe('Log Redaction', () => {
    it('should redact sensitive keys in objects', () => {
        const lines: string[] = [];
        captureLogger(lines).info({
            password: 'test-password',
            authorization: 'Bearer test-token',
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log = JSON.parse(lines[0] ?? '{}');
        assert.strictEqual(log.password, REDACT_CENSOR);
        assert.strictEqual(log.authorization, REDACT_CENSOR);
        assert.strictEqual(log.nested.secret, REDACT_CENSOR);
        assert.strictEqual(log.nested.other, 'safe');
        assert.strictEqual(log.visible, 'ok');
    });

    it('should redact key material and mint signatures', () => {
        const lines: string[] = [];
        captureLogger(lines).info({
            privateKey: 'test-private-key',
            authorization: { recipient: 'holder', signature: '0xtest-signature' },
            config: { jwtSecret: 'test-secret' },
            credentialTypeId: 3
        }, 'signing');

        const log = JSON.parse(lines[0] ?? '{}');
        assert.strictEqual(log.privateKey, REDACT_CENSOR);
        assert.strictEqual(log.authorization, REDACT_CENSOR);
        assert.strictEqual(log.config.jwtSecret, REDACT_CENSOR);
        assert.strictEqual(log.credentialTypeId, 3);
    });

    it('should redact a nested signature when its parent is not redacted', () => {
        const lines: string[] = [];
        captureLogger(lines).info({ mint: { recipient: 'holder', signature: '0xtest-signature' } }, 'mint');

        const log = JSON.parse(lines[0] ?? '{}');
        assert.strictEqual(log.mint.signature, REDACT_CENSOR);
        assert.strictEqual(log.mint.recipient, 'holder');
    });
});
