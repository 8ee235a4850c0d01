/**
 * Unit Tests: Credential API
 *
 * Drives the express app over an ephemeral local port.
 *
 * @see libs/http/app.ts
 * @see libs/http/auth.ts
 * @see libs/http/errors.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { SignJWT } from 'jose';
import { z } from 'zod';
import { createApp } from '../../libs/http/app.js';
import { ApiConfig } from '../../libs/bootstrap/config/engine-config.js';
import { SoulboundCredentialEngine } from '../../libs/engine/SoulboundCredentialEngine.js';
import { ALICE, BOB, MINTER, OWNER, STRANGER, createEngine } from './fixtures.js';

const API_CONFIG: ApiConfig = {
    jwtSecret: 'test-secret-value-0123456789',
    jwtIssuer: 'test-issuer',
    jwtAudience: 'test-audience',
    port: 0
};

const EventsResponseSchema = z.object({
    events: z.array(z.object({ sequence: z.number(), eventType: z.string() }))
});

function signToken(subject: string, secret = API_CONFIG.jwtSecret): Promise<string> {
    return new SignJWT({})
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject(subject)
        .setIssuer(API_CONFIG.jwtIssuer)
        .setAudience(API_CONFIG.jwtAudience)
        .setIssuedAt()
        .setExpirationTime('5m')
        .sign(new TextEncoder().encode(secret));
}

describe('Credential API', () => {
    let engine: SoulboundCredentialEngine;
    let server: Server;
    let baseUrl: string;

    async function call(
        method: string,
        path: string,
        options: { caller?: string; token?: string; body?: unknown } = {}
    ): Promise<{ status: number; body: unknown }> {
        const headers: Record<string, string> = { 'content-type': 'application/json' };
        const token = options.token ?? (options.caller ? await signToken(options.caller) : undefined);
        if (token) {
            headers.authorization = `Bearer ${token}`;
        }
        const response = await fetch(`${baseUrl}${path}`, {
            method,
            headers,
            body: options.body === undefined ? undefined : JSON.stringify(options.body)
        });
        const text = await response.text();
        return { status: response.status, body: text.length > 0 ? JSON.parse(text) : null };
    }

    beforeEach(async () => {
        ({ engine } = createEngine());
        server = createApp(engine, API_CONFIG).listen(0, '127.0.0.1');
        await once(server, 'listening');
        const address = server.address();
        assert.ok(address !== null && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        server.close();
        await once(server, 'close');
    });

    it('should report health without authentication', async () => {
        assert.deepStrictEqual(await call('GET', '/health'), {
            status: 200,
            body: { status: 'ok', authorizationMode: 'role' }
        });
    });

    it('should reject a mutation without a bearer token', async () => {
        assert.deepStrictEqual(await call('POST', '/credential-types', { body: { name: 'Member' } }), {
            status: 401,
            body: { error: { code: 'UNAUTHENTICATED', kind: 'AuthenticationError', message: 'Missing Authorization header' } }
        });
        assert.strictEqual(engine.credentialTypeCount(), 0);
    });

    it('should reject a token signed with another secret', async () => {
        const token = await signToken(OWNER, 'other-test-secret-0123456789');
        const result = await call('POST', '/credential-types', { token, body: { name: 'Member' } });
        assert.strictEqual(result.status, 401);
        assert.strictEqual(engine.credentialTypeCount(), 0);
    });

    it('should let the owner create a credential type', async () => {
        assert.deepStrictEqual(await call('POST', '/credential-types', { caller: OWNER, body: { name: 'Member' } }), {
            status: 201,
            body: { credentialTypeId: 0 }
        });
        assert.deepStrictEqual(await call('GET', '/credential-types/0/supply'), {
            status: 200,
            body: { totalSupply: '0' }
        });
    });

    it('should map an owner-only rejection to 403', async () => {
        assert.deepStrictEqual(await call('POST', '/credential-types', { caller: STRANGER, body: { name: 'Member' } }), {
            status: 403,
            body: { error: { code: 'NOT_OWNER', kind: 'AuthorizationError', message: `Caller ${STRANGER} is not the owner` } }
        });
    });

    it('should return validation issues with a 400', async () => {
        assert.deepStrictEqual(await call('POST', '/credential-types', { caller: OWNER, body: { name: '' } }), {
            status: 400,
            body: {
                error: {
                    code: 'INVALID_INPUT',
                    kind: 'InputValidationError',
                    message: 'Validation failed in CredentialApi:CreateCredentialType',
                    issues: [{ path: 'name', message: 'String must contain at least 1 character(s)' }]
                }
            }
        });
    });

    it('should return 404 for a credential type that was never created', async () => {
        assert.deepStrictEqual(await call('GET', '/credential-types/7'), {
            status: 404,
            body: { error: { code: 'CREDENTIAL_TYPE_NOT_FOUND', kind: 'NotFoundError', message: 'Credential type 7 is not created' } }
        });
    });

    describe('issuance', () => {
        beforeEach(async () => {
            await call('POST', '/credential-types', { caller: OWNER, body: { name: 'Member' } });
            await call('POST', '/credential-types', { caller: OWNER, body: { name: 'Later', startTime: 1_000_000 } });
            await call('POST', '/admin/minters', { caller: OWNER, body: { account: MINTER } });
        });

        it('should mint through a minter and expose the balance', async () => {
            assert.deepStrictEqual(await call('POST', '/mint', { caller: MINTER, body: { to: ALICE, credentialTypeId: 0 } }), {
                status: 201,
                body: { to: ALICE, credentialTypeId: 0, value: '0', path: 'role' }
            });
            assert.deepStrictEqual(await call('GET', `/holders/${ALICE.toLowerCase()}/balances/0`), {
                status: 200,
                body: { balance: '1' }
            });
        });

        it('should read balances for several holders at once', async () => {
            await call('POST', '/mint', { caller: MINTER, body: { to: ALICE, credentialTypeId: 0 } });

            assert.deepStrictEqual(await call('GET', `/balances?holders=${ALICE},${BOB}&ids=0,0`), {
                status: 200,
                body: { balances: ['1', '0'] }
            });
            assert.strictEqual((await call('GET', `/balances?holders=${ALICE}&ids=0,1`)).status, 400);
            assert.deepStrictEqual(await call('GET', '/credential-types/1/created'), {
                status: 200,
                body: { created: true }
            });
        });

        it('should refuse a holder-initiated transfer', async () => {
            await call('POST', '/mint', { caller: MINTER, body: { to: ALICE, credentialTypeId: 0 } });

            const result = await call('POST', '/transfers', {
                caller: ALICE,
                body: { from: ALICE, to: BOB, credentialTypeIds: [0], amounts: ['1'] }
            });
            assert.strictEqual(result.status, 409);
            assert.deepStrictEqual(z.object({ error: z.object({ code: z.string() }) }).parse(result.body), {
                error: { code: 'NON_TRANSFERABLE' }
            });
            assert.strictEqual(engine.balanceOf(ALICE, 0), 1n);
            assert.strictEqual(engine.balanceOf(BOB, 0), 0n);
        });

        it('should map a closed mint window to 422', async () => {
            assert.deepStrictEqual(await call('POST', '/mint', { caller: MINTER, body: { to: ALICE, credentialTypeId: 1 } }), {
                status: 422,
                body: {
                    error: {
                        code: 'NOT_STARTED',
                        kind: 'WindowError',
                        message: 'Mint window for credential type 1 has not started'
                    }
                }
            });
        });

        it('should list journal records from a sequence', async () => {
            const all = EventsResponseSchema.parse((await call('GET', '/events')).body);
            assert.deepStrictEqual(all.events.map((event) => event.eventType), [
                'CREDENTIAL_TYPE_CREATED',
                'CREDENTIAL_TYPE_CREATED',
                'MINTER_ADDED'
            ]);

            const tail = EventsResponseSchema.parse((await call('GET', '/events?since=2')).body);
            assert.deepStrictEqual(tail.events, [{ sequence: 2, eventType: 'MINTER_ADDED' }]);
        });
    });

    it('should reject a malformed JSON body', async () => {
        const response = await fetch(`${baseUrl}/credential-types`, {
            method: 'POST',
            headers: {
                'content-type': 'application/json',
                authorization: `Bearer ${await signToken(OWNER)}`
            },
            body: '{"name":'
        });
        assert.strictEqual(response.status, 400);
        assert.deepStrictEqual(await response.json(), {
            error: { code: 'INVALID_INPUT', kind: 'InputValidationError', message: 'Malformed JSON body' }
        });
    });
});
