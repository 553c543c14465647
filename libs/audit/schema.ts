/**
 * Audit record schema for authenticator decisions.
 */

export type AuditEventType =
    | 'AUTH_GRANTED'
    | 'AUTH_DENIED'
    | 'CONTAINERS_GRANTED'
    | 'CONTAINERS_DENIED'
    | 'SHARE_MDATA_GRANTED'
    | 'SHARE_MDATA_DENIED'
    | 'UNREGISTERED_GRANTED'
    | 'UNREGISTERED_DENIED'
    | 'REVOCATION_ENQUEUED'
    | 'APP_REVOKED';

export interface AuditRecordV1 {
    eventId: string;        // UUID
    eventType: AuditEventType;
    timestamp: string;      // ISO-8601
    requestId: number | null;
    appId: string | null;
    decision: 'ALLOW' | 'DENY' | 'EXECUTED';
    /** Container names or record addresses the decision covers */
    resources?: string[];
    reason?: string;
    integrity: {
        prevHash: string;     // Hash of the immediately preceding record
        hash: string;         // SHA-256(this_record_serialized || prevHash)
    };
}

export const GENESIS_HASH = '0'.repeat(64);
