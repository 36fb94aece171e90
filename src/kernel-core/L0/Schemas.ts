// src/kernel-core/L0/Schemas.ts
import { z } from 'zod';
import type { Command, CommandPayload, RegistryEvent } from './Ontology.js';
import { CONSERVATION_STATUSES } from './Ontology.js';

export const identitySchema = z.string().regex(/^[0-9a-f]{64}$/, 'identity must be 64 lowercase hex characters');

export const conservationStatusSchema = z.enum(CONSERVATION_STATUSES);

const recordIdSchema = z.number().int();

export const registryEventSchema: z.ZodType<RegistryEvent> = z.discriminatedUnion('type', [
    z.object({ type: z.literal('RegistryConstituted'), owner: identitySchema }),
    z.object({ type: z.literal('ContributorAuthorized'), contributor: identitySchema, name: z.string() }),
    z.object({ type: z.literal('ContributorRevoked'), contributor: identitySchema }),
    z.object({ type: z.literal('OwnershipTransferred'), previousOwner: identitySchema, newOwner: identitySchema }),
    z.object({
        type: z.literal('RecordCreated'),
        id: recordIdSchema.positive(),
        scientificName: z.string(),
        habitat: z.string(),
        dataHash: z.string(),
        creator: identitySchema,
        conservationStatus: conservationStatusSchema
    }),
    z.object({ type: z.literal('RecordUpdated'), id: recordIdSchema.positive(), dataHash: z.string() }),
    z.object({ type: z.literal('RecordDeactivated'), id: recordIdSchema.positive() }),
]);

// Target identities stay plain strings here: the registry itself rejects
// malformed or zero identities with INVALID_ARGUMENT.
export const commandPayloadSchema: z.ZodType<CommandPayload> = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('grantContributor'), identity: z.string(), name: z.string() }),
    z.object({ kind: z.literal('revokeContributor'), identity: z.string() }),
    z.object({ kind: z.literal('transferOwnership'), newOwner: z.string() }),
    z.object({
        kind: z.literal('createRecord'),
        scientificName: z.string(),
        habitat: z.string(),
        dataHash: z.string(),
        conservationStatus: z.string().optional()
    }),
    z.object({ kind: z.literal('updateRecord'), id: recordIdSchema, dataHash: z.string() }),
    z.object({ kind: z.literal('deactivateRecord'), id: recordIdSchema }),
]);

export const commandSchema: z.ZodType<Command> = z.object({
    commandId: z.string().regex(/^[0-9a-f]{64}$/, 'commandId must be a SHA-256 hex digest'),
    caller: identitySchema,
    payload: commandPayloadSchema,
    issuedAt: z.number().int().nonnegative(),
    nonce: z.string().min(1).max(64),
    signature: z.string().regex(/^[0-9a-fA-F]*$/, 'signature must be hex')
});
