import type { Task } from './task.js';

export type TaskAction =
    | 'TASK_CREATE'
    | 'TASK_REPLACE'
    | 'TASK_PATCH'
    | 'TASK_DELETE'
    | 'TASK_LOCK'
    | 'TASK_UNLOCK';

export interface PolicyRule {
    id: string;
    action: TaskAction | '*';
    effect: 'ALLOW' | 'DENY';
    condition?: string; // `field=value` against the task, e.g. `locked=true`
    reason?: string;
}

export interface PolicyDecision {
    allowed: boolean;
    matchedRules: PolicyRule[];
    reason?: string;
}

export interface PolicyEngine {
    evaluate(action: TaskAction, resource: Task): PolicyDecision;
}
