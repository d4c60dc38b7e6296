import {
    TASK_LOCKED_MESSAGE,
    type PolicyDecision,
    type PolicyEngine,
    type PolicyRule,
    type Task,
    type TaskAction,
} from '@tasklane/domain';

export const isLocked = (task: Task): boolean => task.locked;

/**
 * Writes allowed by default; replace, patch and delete denied while the task is locked.
 * Lock and unlock carry no deny rule, so unlocking is the way out of a locked state.
 */
export const DEFAULT_TASK_RULES: readonly PolicyRule[] = [
    { id: 'allow-all', action: '*', effect: 'ALLOW' },
    { id: 'locked-replace', action: 'TASK_REPLACE', effect: 'DENY', condition: 'locked=true', reason: TASK_LOCKED_MESSAGE },
    { id: 'locked-patch', action: 'TASK_PATCH', effect: 'DENY', condition: 'locked=true', reason: TASK_LOCKED_MESSAGE },
    { id: 'locked-delete', action: 'TASK_DELETE', effect: 'DENY', condition: 'locked=true', reason: TASK_LOCKED_MESSAGE },
];

export class HardenedPolicyEngine implements PolicyEngine {
    constructor(private readonly rules: readonly PolicyRule[] = DEFAULT_TASK_RULES) { }

    evaluate(action: TaskAction, resource: Task): PolicyDecision {
        const matchedRules: PolicyRule[] = [];
        let deniedBy: PolicyRule | undefined;
        let explicitAllow = false;

        for (const rule of this.rules) {
            if (this.matchesRule(rule, action, resource)) {
                matchedRules.push(rule);
                if (rule.effect === 'DENY') {
                    deniedBy = deniedBy ?? rule;
                } else {
                    explicitAllow = true;
                }
            }
        }

        // deny-overrides-allow
        if (deniedBy) {
            return {
                allowed: false,
                matchedRules,
                reason: deniedBy.reason ?? 'Explicitly denied by policy (Deny-Overrides-Allow)',
            };
        }

        if (explicitAllow) {
            return { allowed: true, matchedRules };
        }

        return {
            allowed: false,
            matchedRules,
            reason: 'No matching allow rule found (Default Deny)',
        };
    }

    private matchesRule(rule: PolicyRule, action: TaskAction, resource: Task): boolean {
        if (rule.action !== '*' && rule.action !== action) {
            return false;
        }

        if (rule.condition) {
            return this.evaluateCondition(rule.condition, resource);
        }

        return true;
    }

    // Supports `field=value` on top-level task fields, e.g. locked=true, priority=high.
    private evaluateCondition(condition: string, resource: Task): boolean {
        const [key, value] = condition.split('=');
        if (!key || value === undefined) return true;

        const entry = Object.entries(resource).find(([field]) => field === key.trim());
        if (!entry) return false;

        return String(entry[1]) === value.trim();
    }
}
