import type { Task } from '@tasklane/domain';
import { CommandPipeline, type TaskCommand } from './command-pipeline.js';

export interface DeleteTaskCommand extends TaskCommand<null> {
    type: 'TASK_DELETE';
}

export class DeleteTaskPipeline extends CommandPipeline<DeleteTaskCommand, null, Task, void> {
    protected loadTarget(command: DeleteTaskCommand): Promise<Task> {
        return this.requireTask(command.taskId);
    }

    protected validate(): null {
        return null;
    }

    protected async handle(_command: DeleteTaskCommand, _input: null, target: Task): Promise<void> {
        await this.repository.delete(target.id);
    }

    protected getResourceId(command: DeleteTaskCommand): string {
        return String(command.taskId);
    }
}
