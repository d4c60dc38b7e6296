import type { Task, TaskId, TaskPriority } from './task.js';
import type { AuditEvent } from './audit.js';

export interface TaskView {
    id: TaskId;
    title: string;
    description: string;
    completed: boolean;
    priority: TaskPriority;
    dueDate: string | null;
    tags: string[];
    locked: boolean;
    createdAt: string;
    updatedAt: string;
}

export interface AuditEventView {
    id: string;
    timestamp: string;
    action: AuditEvent['action'];
    resourceId: string;
    outcome: AuditEvent['outcome'];
    reason?: string;
}

export const toTaskView = (task: Task): TaskView => ({
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    priority: task.priority,
    dueDate: task.dueDate ? task.dueDate.toISOString() : null,
    tags: [...task.tags],
    locked: task.locked,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
});

export const toAuditEventView = (event: AuditEvent): AuditEventView => ({
    id: event.id,
    timestamp: event.timestamp.toISOString(),
    action: event.action,
    resourceId: event.resourceId,
    outcome: event.outcome,
    ...(event.reason !== undefined ? { reason: event.reason } : {}),
});
