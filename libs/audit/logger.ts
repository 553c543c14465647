import crypto from 'crypto';
import { AuditEventType, AuditRecordV1, GENESIS_HASH } from './schema.js';
import { ContextLogger } from '../logging/logger.js';

export interface AuditEvent {
    type: AuditEventType;
    requestId?: number;
    appId?: string;
    decision: 'ALLOW' | 'DENY' | 'EXECUTED';
    resources?: string[];
    reason?: string;
}

/**
 * Hash-chained, append-only audit trail of an authenticator's decisions.
 * Records are frozen once appended.
 */
export class AuditLogger {
    private readonly records: AuditRecordV1[] = [];
    private lastHash = GENESIS_HASH;

    constructor(private readonly logger: ContextLogger) { }

    log(event: AuditEvent): AuditRecordV1 {
        const record: Omit<AuditRecordV1, 'integrity'> = {
            eventId: crypto.randomUUID(),
            eventType: event.type,
            timestamp: new Date().toISOString(),
            requestId: event.requestId ?? null,
            appId: event.appId ?? null,
            decision: event.decision,
            ...(event.resources ? { resources: [...event.resources] } : {}),
            ...(event.reason ? { reason: event.reason } : {})
        };

        const prevHash = this.lastHash;
        const hash = crypto.createHash('sha256')
            .update(JSON.stringify(record) + prevHash)
            .digest('hex');

        const signedRecord: AuditRecordV1 = Object.freeze({ ...record, integrity: Object.freeze({ prevHash, hash }) });
        this.records.push(signedRecord);
        this.lastHash = hash;

        this.logger.info({ auditEvent: event.type, appId: event.appId, integrityHash: hash }, 'Audit record appended');
        return signedRecord;
    }

    entries(): readonly AuditRecordV1[] {
        return [...this.records];
    }

    /**
     * One JSON record per line, in append order.
     */
    toJSONL(): string {
        return this.records.map(record => JSON.stringify(record)).join('\n');
    }
}
