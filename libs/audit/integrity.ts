import crypto from 'crypto';
import { z } from 'zod';
import { GENESIS_HASH } from './schema.js';

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain of audit records.
 */

export interface ChainVerification {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
}

const IntegritySchema = z.object({
    integrity: z.object({ prevHash: z.string(), hash: z.string() })
}).passthrough();

export function verifyAuditChain(records: readonly unknown[]): ChainVerification {
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
        const parsed = IntegritySchema.safeParse(records[i]);
        if (!parsed.success) {
            return { valid: false, violationIndex: i, reason: `Format error at record ${i}: missing integrity block` };
        }
        const { integrity, ...contentsOnly } = parsed.data;

        if (integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${integrity.prevHash}`
            };
        }

        const computedHash = crypto.createHash('sha256')
            .update(JSON.stringify(contentsOnly) + integrity.prevHash)
            .digest('hex');
        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}

/**
 * Verifies a JSONL export; an unparsable line is reported as a format error.
 */
export function verifyAuditLog(jsonl: string): ChainVerification {
    const lines = jsonl.trim() === '' ? [] : jsonl.trim().split('\n');
    const records: unknown[] = [];
    for (let i = 0; i < lines.length; i++) {
        try {
            records.push(JSON.parse(lines[i] ?? ''));
        } catch (e: unknown) {
            const errorMessage = e instanceof Error ? e.message : 'Parse error';
            return { valid: false, violationIndex: i, reason: `Format error at record ${i}: ${errorMessage}` };
        }
    }
    return verifyAuditChain(records);
}
