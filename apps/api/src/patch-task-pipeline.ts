import type { Task } from '@tasklane/domain';
import { CommandPipeline, type TaskCommand } from './command-pipeline.js';
import { applyTaskPatch, parsePatchTaskPayload, type PatchTaskInput } from './task-schemas.js';

export interface PatchTaskCommand extends TaskCommand {
    type: 'TASK_PATCH';
}

export class PatchTaskPipeline extends CommandPipeline<PatchTaskCommand, PatchTaskInput, Task, Task> {
    protected loadTarget(command: PatchTaskCommand): Promise<Task> {
        return this.requireTask(command.taskId);
    }

    protected validate(command: PatchTaskCommand): PatchTaskInput {
        return parsePatchTaskPayload(command.payload);
    }

    protected async handle(_command: PatchTaskCommand, input: PatchTaskInput, target: Task): Promise<Task> {
        const updated = applyTaskPatch(target, input, this.clock());
        if (updated === target) return target;

        await this.repository.save(updated);
        return updated;
    }

    protected getResourceId(command: PatchTaskCommand): string {
        return String(command.taskId);
    }
}
