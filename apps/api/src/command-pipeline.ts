import {
    ForbiddenError,
    LockedError,
    NotFoundError,
    systemClock,
    type AuditLogger,
    type Clock,
    type PolicyEngine,
    type Task,
    type TaskAction,
    type TaskId,
    type TaskRepository,
} from '@tasklane/domain';
import { isLocked } from '@tasklane/policy';

export interface Command<T = unknown> {
    type: TaskAction;
    payload: T;
}

export interface TaskCommand<T = unknown> extends Command<T> {
    taskId: TaskId;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Runs one write against the task store: load the target, check it against the policy engine,
 * validate the payload, apply, audit. The whole sequence holds the repository's exclusive
 * section, so nothing else can touch the store between the check and the write.
 */
export abstract class CommandPipeline<TCommand extends Command, TInput, TTarget extends Task | null, TResult> {
    constructor(
        protected readonly policyEngine: PolicyEngine,
        protected readonly auditLogger: AuditLogger,
        protected readonly repository: TaskRepository,
        protected readonly clock: Clock = systemClock
    ) { }

    execute(command: TCommand): Promise<TResult> {
        return this.repository.runExclusive(() => this.run(command));
    }

    private async run(command: TCommand): Promise<TResult> {
        // 1. Load the task the command targets
        const target = await this.loadTarget(command);

        // 2. Policy check comes before validation: a locked task reports as locked,
        //    whatever the payload looks like
        if (target) {
            await this.authorize(command, target, String(target.id), true);
        }

        // 3. Validate
        const input = this.validate(command);

        // Commands without a stored target are checked against the task they would produce
        if (!target) {
            const prospective = this.getProspectiveTask(input);
            if (prospective) {
                await this.authorize(command, prospective, 'new-task', false);
            }
        }

        // 4. Apply
        const result = await this.handle(command, input, target);

        await this.auditLogger.log({
            action: command.type,
            resourceId: this.getResourceId(command, result),
            outcome: 'ALLOW',
            payload: this.getAuditPayload(command),
        });

        return result;
    }

    private async authorize(command: TCommand, resource: Task, resourceId: string, stored: boolean): Promise<void> {
        const decision = this.policyEngine.evaluate(command.type, resource);
        if (decision.allowed) return;

        await this.auditLogger.log({
            action: command.type,
            resourceId,
            outcome: 'DENY',
            reason: decision.reason,
            payload: this.getAuditPayload(command),
        });
        throw stored && isLocked(resource)
            ? new LockedError(resource.id)
            : new ForbiddenError(decision.reason ?? 'Access denied');
    }

    protected getProspectiveTask(_input: TInput): Task | null {
        return null;
    }

    protected async requireTask(id: TaskId): Promise<Task> {
        const task = await this.repository.findById(id);
        if (!task) throw new NotFoundError(id);
        return task;
    }

    protected getAuditPayload(command: TCommand): Record<string, unknown> {
        return isRecord(command.payload) ? command.payload : {};
    }

    protected abstract loadTarget(command: TCommand): Promise<TTarget>;
    protected abstract validate(command: TCommand): TInput;
    protected abstract handle(command: TCommand, input: TInput, target: TTarget): Promise<TResult>;
    protected abstract getResourceId(command: TCommand, result: TResult): string;
}
