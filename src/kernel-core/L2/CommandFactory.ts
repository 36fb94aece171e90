// src/kernel-core/L2/CommandFactory.ts
import type { Command, CommandPayload, Identity } from '../L0/Ontology.js';
import { signData, verifySignature, hash, canonicalize, randomNonce } from '../L0/Crypto.js';
import type { Ed25519PrivateKey } from '../L0/Crypto.js';
import type { GuardResult } from '../L0/Guards.js';
import { ErrorCode } from '../Errors.js';

/**
 * Command ID = SHA256(caller:payload:issuedAt:nonce)
 */
export function commandDigest(caller: Identity, payload: CommandPayload, issuedAt: number, nonce: string): string {
    return hash(`${caller}:${canonicalize(payload)}:${issuedAt}:${nonce}`);
}

// The signature covers the command id as well (provenance binding)
function signable(command: Omit<Command, 'signature'>): string {
    return `${command.commandId}:${command.caller}:${canonicalize(command.payload)}:${command.issuedAt}:${command.nonce}`;
}

export class CommandFactory {
    static async create(
        payload: CommandPayload,
        caller: Identity,
        privateKey: Ed25519PrivateKey,
        issuedAt: number = Date.now(),
        nonce: string = randomNonce(8)
    ): Promise<Command> {
        const commandId = commandDigest(caller, payload, issuedAt, nonce);
        const unsigned = { commandId, caller, payload, issuedAt, nonce };
        const signature = await signData(signable(unsigned), privateKey);
        return { ...unsigned, signature };
    }
}

/**
 * Checks that the command id matches its contents and that the caller's key
 * signed it. The caller identity is the Ed25519 public key.
 */
export async function authenticate(command: Command): Promise<GuardResult> {
    const expectedId = commandDigest(command.caller, command.payload, command.issuedAt, command.nonce);
    if (expectedId !== command.commandId) {
        return { ok: false, code: ErrorCode.SIGNATURE_INVALID, violation: 'Command id does not match its contents' };
    }
    if (!(await verifySignature(signable(command), command.signature, command.caller))) {
        return { ok: false, code: ErrorCode.SIGNATURE_INVALID, violation: 'Invalid Signature' };
    }
    return { ok: true };
}
