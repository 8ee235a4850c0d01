/**
 * Credential API
 *
 * JSON surface over one SoulboundCredentialEngine. Mutating routes require a
 * bearer token whose subject is the caller's address; reads are public.
 * Quantities travel as decimal strings in both directions.
 */

import express from 'express';
import type { Express } from 'express';
import { SoulboundCredentialEngine } from '../engine/SoulboundCredentialEngine.js';
import { CredentialType } from '../registry/credentialRegistry.js';
import { IssuanceReceipt } from '../issuance/issuanceEngine.js';
import { RecoveryReceipt } from '../recovery/recoveryOperation.js';
import { ApiConfig } from '../bootstrap/config/engine-config.js';
import { validate } from '../validation/zod-middleware.js';
import {
    AccountRequestSchema,
    AddressSchema,
    ApprovalRequestSchema,
    BalanceBatchQuerySchema,
    BaseUriRequestSchema,
    BurnBatchRequestSchema,
    BurnRequestSchema,
    CreateCredentialTypeSchema,
    CredentialTypeIdParamSchema,
    MintRequestSchema,
    RecoverRequestSchema,
    SequenceParamSchema,
    TransferRequestSchema,
    ValueRequestSchema
} from '../validation/schema.js';
import { getCaller, requireCaller } from './auth.js';
import { errorHandler } from './errors.js';

export function serializeCredentialType(type: CredentialType) {
    return {
        id: type.id,
        name: type.name,
        description: type.description,
        creator: type.creator,
        createdAt: type.createdAt,
        startTime: type.startTime,
        endTime: type.endTime,
        price: type.price.toString()
    };
}

export function serializeReceipt(receipt: IssuanceReceipt) {
    return {
        to: receipt.to,
        credentialTypeId: receipt.credentialTypeId,
        value: receipt.value.toString(),
        path: receipt.path,
        ...(receipt.nonce !== undefined ? { nonce: receipt.nonce.toString() } : {})
    };
}

export function serializeRecovery(receipt: RecoveryReceipt) {
    return {
        oldHolder: receipt.oldHolder,
        newHolder: receipt.newHolder,
        moved: receipt.moved.map((entry) => ({
            credentialTypeId: entry.credentialTypeId,
            amount: entry.amount.toString()
        }))
    };
}

export function createApp(engine: SoulboundCredentialEngine, config: ApiConfig): Express {
    const app = express();
    app.use(express.json({ limit: '64kb' }));
    const authenticated = requireCaller(config);

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', authorizationMode: engine.authorizationMode });
    });

    // --- Registry ---

    app.get('/credential-types', (_req, res) => {
        res.json({ count: engine.credentialTypeCount() });
    });

    app.post('/credential-types', authenticated, (req, res) => {
        const input = validate(CreateCredentialTypeSchema, req.body, 'CredentialApi:CreateCredentialType');
        const credentialTypeId = engine.createCredentialType(getCaller(res), input);
        res.status(201).json({ credentialTypeId });
    });

    app.get('/credential-types/:id', (req, res) => {
        const id = validate(CredentialTypeIdParamSchema, req.params.id, 'CredentialApi:CredentialTypeId');
        res.json(serializeCredentialType(engine.getMetadata(id)));
    });

    app.get('/credential-types/:id/created', (req, res) => {
        const id = validate(CredentialTypeIdParamSchema, req.params.id, 'CredentialApi:CredentialTypeId');
        res.json({ created: engine.isCreated(id) });
    });

    app.get('/credential-types/:id/uri', (req, res) => {
        const id = validate(CredentialTypeIdParamSchema, req.params.id, 'CredentialApi:CredentialTypeId');
        res.json({ uri: engine.uri(id) });
    });

    app.get('/credential-types/:id/mintable', (req, res) => {
        const id = validate(CredentialTypeIdParamSchema, req.params.id, 'CredentialApi:CredentialTypeId');
        res.json({ mintable: engine.isMintable(id) });
    });

    app.get('/credential-types/:id/supply', (req, res) => {
        const id = validate(CredentialTypeIdParamSchema, req.params.id, 'CredentialApi:CredentialTypeId');
        res.json({ totalSupply: engine.totalSupply(id).toString() });
    });

    // --- Issuance, burn, transfer ---

    app.post('/mint', authenticated, (req, res) => {
        const request = validate(MintRequestSchema, req.body, 'CredentialApi:Mint');
        const receipt = engine.mint(getCaller(res), request);
        res.status(201).json(serializeReceipt(receipt));
    });

    app.post('/burn', authenticated, (req, res) => {
        const body = validate(BurnRequestSchema, req.body, 'CredentialApi:Burn');
        engine.burn(getCaller(res), body.holder, body.credentialTypeId, body.amount);
        res.status(204).end();
    });

    app.post('/burn-batch', authenticated, (req, res) => {
        const body = validate(BurnBatchRequestSchema, req.body, 'CredentialApi:BurnBatch');
        engine.burnBatch(getCaller(res), body.holder, body.credentialTypeIds, body.amounts);
        res.status(204).end();
    });

    app.post('/transfers', authenticated, (req, res) => {
        const body = validate(TransferRequestSchema, req.body, 'CredentialApi:Transfer');
        engine.safeBatchTransferFrom(getCaller(res), body.from, body.to, body.credentialTypeIds, body.amounts);
        res.status(204).end();
    });

    app.post('/approvals', authenticated, (req, res) => {
        const body = validate(ApprovalRequestSchema, req.body, 'CredentialApi:Approval');
        engine.setApprovalForAll(getCaller(res), body.operator, body.approved);
        res.status(204).end();
    });

    app.get('/approvals/:holder/:operator', (req, res) => {
        const holder = validate(AddressSchema, req.params.holder, 'CredentialApi:Holder');
        const operator = validate(AddressSchema, req.params.operator, 'CredentialApi:Operator');
        res.json({ approved: engine.isApprovedForAll(holder, operator) });
    });

    // --- Recovery and value ---

    app.post('/recover', authenticated, (req, res) => {
        const body = validate(RecoverRequestSchema, req.body, 'CredentialApi:Recover');
        res.json(serializeRecovery(engine.recover(getCaller(res), body.oldHolder, body.newHolder)));
    });

    app.post('/value', authenticated, (req, res) => {
        const body = validate(ValueRequestSchema, req.body, 'CredentialApi:Value');
        engine.receiveValue(getCaller(res), body.amount);
        res.status(204).end();
    });

    // --- Holder reads ---

    app.get('/holders/:holder/balances/:id', (req, res) => {
        const holder = validate(AddressSchema, req.params.holder, 'CredentialApi:Holder');
        const id = validate(CredentialTypeIdParamSchema, req.params.id, 'CredentialApi:CredentialTypeId');
        res.json({ balance: engine.balanceOf(holder, id).toString() });
    });

    app.get('/balances', (req, res) => {
        const query = validate(BalanceBatchQuerySchema, req.query, 'CredentialApi:BalanceBatch');
        res.json({ balances: engine.balanceOfBatch(query.holders, query.ids).map((balance) => balance.toString()) });
    });

    app.get('/holders/:holder/nonce', (req, res) => {
        const holder = validate(AddressSchema, req.params.holder, 'CredentialApi:Holder');
        res.json({ nonce: engine.nonceOf(holder).toString() });
    });

    // --- Administration ---

    app.get('/admin/state', (_req, res) => {
        res.json({
            owner: engine.owner(),
            pendingOwner: engine.pendingOwner(),
            signer: engine.signer(),
            treasury: engine.treasury(),
            paused: engine.paused(),
            baseMetadataURI: engine.baseMetadataURI(),
            authorizationMode: engine.authorizationMode
        });
    });

    app.get('/admin/minters/:account', (req, res) => {
        const account = validate(AddressSchema, req.params.account, 'CredentialApi:Minter');
        res.json({ minter: engine.isMinter(account) });
    });

    app.post('/admin/minters', authenticated, (req, res) => {
        const body = validate(AccountRequestSchema, req.body, 'CredentialApi:AddMinter');
        engine.addMinter(getCaller(res), body.account);
        res.status(204).end();
    });

    app.delete('/admin/minters/:account', authenticated, (req, res) => {
        const account = validate(AddressSchema, req.params.account, 'CredentialApi:RemoveMinter');
        engine.removeMinter(getCaller(res), account);
        res.status(204).end();
    });

    app.put('/admin/signer', authenticated, (req, res) => {
        const body = validate(AccountRequestSchema, req.body, 'CredentialApi:SetSigner');
        engine.setSigner(getCaller(res), body.account);
        res.status(204).end();
    });

    app.put('/admin/treasury', authenticated, (req, res) => {
        const body = validate(AccountRequestSchema, req.body, 'CredentialApi:SetTreasury');
        engine.setTreasury(getCaller(res), body.account);
        res.status(204).end();
    });

    app.put('/admin/base-uri', authenticated, (req, res) => {
        const body = validate(BaseUriRequestSchema, req.body, 'CredentialApi:SetBaseUri');
        engine.setBaseMetadataURI(getCaller(res), body.baseURI);
        res.status(204).end();
    });

    app.post('/admin/pause', authenticated, (_req, res) => {
        engine.pause(getCaller(res));
        res.status(204).end();
    });

    app.post('/admin/unpause', authenticated, (_req, res) => {
        engine.unpause(getCaller(res));
        res.status(204).end();
    });

    app.post('/admin/ownership/transfer', authenticated, (req, res) => {
        const body = validate(AccountRequestSchema, req.body, 'CredentialApi:TransferOwnership');
        engine.transferOwnership(getCaller(res), body.account);
        res.status(204).end();
    });

    app.post('/admin/ownership/accept', authenticated, (_req, res) => {
        engine.acceptOwnership(getCaller(res));
        res.status(204).end();
    });

    // --- Journal ---

    app.get('/events', (req, res) => {
        const since = validate(SequenceParamSchema, req.query.since ?? 0, 'CredentialApi:EventsSince');
        res.json({ events: engine.eventsSince(since) });
    });

    app.use(errorHandler);
    return app;
}
