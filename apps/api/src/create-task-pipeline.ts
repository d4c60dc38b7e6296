import type { Task, TaskFields } from '@tasklane/domain';
import { type Command, CommandPipeline } from './command-pipeline.js';
import { parseCreateTaskPayload } from './task-schemas.js';

export interface CreateTaskCommand extends Command {
    type: 'TASK_CREATE';
}

export class CreateTaskPipeline extends CommandPipeline<CreateTaskCommand, TaskFields, null, Task> {
    protected async loadTarget(): Promise<null> {
        return null;
    }

    protected validate(command: CreateTaskCommand): TaskFields {
        return parseCreateTaskPayload(command.payload);
    }

    // Id 0 stands in until the repository issues one; nothing is consumed by a denied create.
    protected getProspectiveTask(input: TaskFields): Task {
        const now = this.clock();
        return { id: 0, ...input, createdAt: now, updatedAt: now };
    }

    protected async handle(_command: CreateTaskCommand, input: TaskFields): Promise<Task> {
        const now = this.clock();
        const task: Task = {
            id: await this.repository.nextId(),
            ...input,
            createdAt: now,
            updatedAt: now,
        };

        await this.repository.save(task);
        return task;
    }

    protected getResourceId(_command: CreateTaskCommand, result: Task): string {
        return String(result.id);
    }
}
