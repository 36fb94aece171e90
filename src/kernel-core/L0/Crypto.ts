// src/kernel-core/L0/Crypto.ts
import { createHash, randomBytes } from 'crypto';
import * as ed from '@noble/ed25519';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Deterministic JSON: object keys sorted, undefined members dropped.
 * Every hash in the registry is taken over this form.
 */
export function canonicalize(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map(v => canonicalize(v)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.2 Digital Signatures (Ed25519)
export type Ed25519PublicKey = string; // Hex encoded, 32 bytes
export type Ed25519PrivateKey = string; // Hex encoded, 32 bytes
export type Signature = string; // Hex encoded, 64 bytes

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

export async function generateKeyPair(): Promise<KeyPair> {
    const privateKey = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKey(privateKey);
    return { publicKey: toHex(publicKey), privateKey: toHex(privateKey) };
}

export async function signData(data: string, privateKey: Ed25519PrivateKey): Promise<Signature> {
    const signature = await ed.sign(Buffer.from(data, 'utf8'), privateKey);
    return toHex(signature);
}

export async function verifySignature(data: string, signature: Signature, publicKey: Ed25519PublicKey): Promise<boolean> {
    try {
        return await ed.verify(signature, Buffer.from(data, 'utf8'), publicKey);
    } catch (e) {
        // Malformed key or signature encodings never verify
        return false;
    }
}

// 1.3 Randomness
export function randomNonce(bytes: number = 16): string {
    return randomBytes(bytes).toString('hex');
}
