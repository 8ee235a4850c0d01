import { z } from 'zod';
import { AddressSchema, UintSchema } from '../../validation/schema.js';
import { InputValidationError } from '../../errors/credentialErrors.js';
import { EngineConfig } from '../../engine/SoulboundCredentialEngine.js';
import { GuardRule } from '../config-guard.js';

/**
 * Engine and API configuration, read from the environment.
 */
export const EngineEnvSchema = z.object({
    AUTHORIZATION_MODE: z.enum(['role', 'signature']).default('role'),
    DOMAIN_ID: UintSchema.optional(),
    OWNER_ADDRESS: AddressSchema,
    SIGNER_ADDRESS: AddressSchema.optional(),
    TREASURY_ADDRESS: AddressSchema.optional(),
    BASE_METADATA_URI: z.string().default(''),
    API_JWT_SECRET: z.string().min(16),
    API_JWT_ISSUER: z.string().min(1).default('soulbound-credentials-idp'),
    API_JWT_AUDIENCE: z.string().min(1).default('soulbound-credentials-api'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    EVENT_RELAY_ENABLED: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
}).superRefine((env, ctx) => {
    if (env.AUTHORIZATION_MODE === 'signature') {
        if (env.DOMAIN_ID === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DOMAIN_ID'], message: 'DOMAIN_ID is required in signature mode' });
        }
        if (env.SIGNER_ADDRESS === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SIGNER_ADDRESS'], message: 'SIGNER_ADDRESS is required in signature mode' });
        }
    }
});

export type EngineEnv = z.infer<typeof EngineEnvSchema>;

export interface ApiConfig {
    jwtSecret: string;
    jwtIssuer: string;
    jwtAudience: string;
    port: number;
}

export interface ServiceConfig {
    engine: EngineConfig;
    api: ApiConfig;
    eventRelayEnabled: boolean;
}

export const ENGINE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'OWNER_ADDRESS' },
    { type: 'required', name: 'API_JWT_SECRET', sensitive: true },
    {
        type: 'forbidIf',
        name: 'API_JWT_SECRET',
        when: (env) => env.NODE_ENV === 'production' && (env.API_JWT_SECRET ?? '').length < 32,
        message: 'API_JWT_SECRET must be at least 32 characters in production',
    },
];

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const result = EngineEnvSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
        throw new InputValidationError('Invalid engine configuration', issues);
    }
    const parsed = result.data;

    return {
        engine: {
            owner: parsed.OWNER_ADDRESS,
            authorizationMode: parsed.AUTHORIZATION_MODE,
            ...(parsed.DOMAIN_ID !== undefined ? { domainId: parsed.DOMAIN_ID } : {}),
            signer: parsed.SIGNER_ADDRESS ?? null,
            treasury: parsed.TREASURY_ADDRESS ?? null,
            baseMetadataURI: parsed.BASE_METADATA_URI
        },
        api: {
            jwtSecret: parsed.API_JWT_SECRET,
            jwtIssuer: parsed.API_JWT_ISSUER,
            jwtAudience: parsed.API_JWT_AUDIENCE,
            port: parsed.PORT
        },
        eventRelayEnabled: parsed.EVENT_RELAY_ENABLED
    };
}
