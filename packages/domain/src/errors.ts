import type { TaskId } from './task.js';

export const TASK_LOCKED_MESSAGE = 'This task is locked and cannot be modified.';

export class ValidationError extends Error {
    constructor(
        public readonly fields: string[],
        message = `Invalid value for: ${fields.join(', ')}`
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    constructor(public readonly taskId: TaskId | string) {
        super(`Task ${taskId} not found`);
        this.name = 'NotFoundError';
    }
}

export class ForbiddenError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ForbiddenError';
    }
}

export class LockedError extends ForbiddenError {
    constructor(public readonly taskId: TaskId) {
        super(TASK_LOCKED_MESSAGE);
        this.name = 'LockedError';
    }
}
