import { randomUUID } from 'node:crypto';
import type { AuditEvent, AuditEventSource, AuditLogger } from '@tasklane/domain';

export interface AppendOnlyAuditLogger extends AuditLogger, AuditEventSource { }

export interface AuditLoggerOptions {
    /** Echo each event to stdout as it is appended. */
    echo?: boolean;
}

export class InMemoryAppendOnlyLogger implements AppendOnlyAuditLogger {
    private events: AuditEvent[] = [];
    private readonly echo: boolean;

    constructor(options: AuditLoggerOptions = {}) {
        this.echo = options.echo ?? true;
    }

    async log(event: Omit<AuditEvent, 'id' | 'timestamp'>): Promise<void> {
        const fullEvent: AuditEvent = Object.freeze({
            ...event,
            id: randomUUID(),
            timestamp: new Date(),
            payload: Object.freeze({ ...event.payload }),
        });

        this.events.push(fullEvent);
        if (this.echo) {
            console.log('[AUDIT LOG]', JSON.stringify(fullEvent));
        }
    }

    getEvents(): ReadonlyArray<AuditEvent> {
        return Object.freeze([...this.events]);
    }
}
