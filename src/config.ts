// ============================================================================
// REGISTRY CONFIGURATION
// Environment variables (optionally from .env) validated at startup
// ============================================================================

import 'dotenv/config';
import { z } from 'zod';
import { identitySchema } from './kernel-core/L0/Schemas.js';
import { ZERO_IDENTITY } from './kernel-core/L0/Ontology.js';
import { ErrorCode, RegistryError } from './kernel-core/Errors.js';

const envSchema = z.object({
    REGISTRY_OWNER: identitySchema.refine(v => v !== ZERO_IDENTITY, 'owner must not be the zero identity'),
    REGISTRY_DB_PATH: z.string().min(1).default('registry.db'),
    PORT: z.string().regex(/^\d+$/, 'PORT must be a number').default('3000')
        .transform(v => Number(v))
        .pipe(z.number().int().max(65535)),
    HOST: z.string().min(1).default('127.0.0.1'),
});

export interface RegistryConfig {
    owner: string;
    databasePath: string; // ':memory:' keeps the log in process
    port: number;
    host: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const keys = parsed.error.issues.map(issue => issue.path.join('.'));
        throw new RegistryError(ErrorCode.INVALID_ARGUMENT, `Invalid configuration: ${keys.join(', ')}`, {
            issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        });
    }

    return {
        owner: parsed.data.REGISTRY_OWNER,
        databasePath: parsed.data.REGISTRY_DB_PATH,
        port: parsed.data.PORT,
        host: parsed.data.HOST
    };
}
