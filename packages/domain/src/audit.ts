import type { TaskAction } from './policy.js';

export type AuditEventId = string;

export interface AuditEvent {
    id: AuditEventId;
    timestamp: Date;
    action: TaskAction;
    resourceId: string;
    outcome: 'ALLOW' | 'DENY';
    reason?: string;
    payload: Readonly<Record<string, unknown>>;
}

export interface AuditLogger {
    log(event: Omit<AuditEvent, 'id' | 'timestamp'>): Promise<void>;
}

export interface AuditEventSource {
    getEvents(): ReadonlyArray<AuditEvent>;
}
