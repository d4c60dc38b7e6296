import type { Task } from '@tasklane/domain';
import { CommandPipeline, type TaskCommand } from './command-pipeline.js';

export interface SetTaskLockCommand extends TaskCommand<null> {
    type: 'TASK_LOCK' | 'TASK_UNLOCK';
}

// Dedicated lock/unlock operations. Unlock is the only write a locked task accepts.
export class SetTaskLockPipeline extends CommandPipeline<SetTaskLockCommand, null, Task, Task> {
    protected loadTarget(command: SetTaskLockCommand): Promise<Task> {
        return this.requireTask(command.taskId);
    }

    protected validate(): null {
        return null;
    }

    protected async handle(command: SetTaskLockCommand, _input: null, target: Task): Promise<Task> {
        const locked = command.type === 'TASK_LOCK';
        if (target.locked === locked) return target;

        const updated: Task = { ...target, locked, updatedAt: this.clock() };
        await this.repository.save(updated);
        return updated;
    }

    protected getResourceId(command: SetTaskLockCommand): string {
        return String(command.taskId);
    }
}
