import type { Task, TaskFields } from '@tasklane/domain';
import { CommandPipeline, type TaskCommand } from './command-pipeline.js';
import { parseReplaceTaskPayload } from './task-schemas.js';

export interface ReplaceTaskCommand extends TaskCommand {
    type: 'TASK_REPLACE';
}

export class ReplaceTaskPipeline extends CommandPipeline<ReplaceTaskCommand, TaskFields, Task, Task> {
    protected loadTarget(command: ReplaceTaskCommand): Promise<Task> {
        return this.requireTask(command.taskId);
    }

    protected validate(command: ReplaceTaskCommand): TaskFields {
        return parseReplaceTaskPayload(command.payload);
    }

    protected async handle(_command: ReplaceTaskCommand, input: TaskFields, target: Task): Promise<Task> {
        const replaced: Task = {
            ...input,
            id: target.id,
            createdAt: target.createdAt,
            updatedAt: this.clock(),
        };

        await this.repository.save(replaced);
        return replaced;
    }

    protected getResourceId(command: ReplaceTaskCommand): string {
        return String(command.taskId);
    }
}
