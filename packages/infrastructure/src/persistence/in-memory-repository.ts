import { cloneTask, isTaskPriority, type Task, type TaskId, type TaskRepository } from '@tasklane/domain';

export class InMemoryTaskRepository implements TaskRepository {
    // Ids only grow, so insertion order is ascending id.
    private tasks: Map<TaskId, Task> = new Map();
    private lastId = 0;
    private queue: Promise<void> = Promise.resolve();

    async nextId(): Promise<TaskId> {
        this.lastId += 1;
        return this.lastId;
    }

    async findById(id: TaskId): Promise<Task | null> {
        const task = this.tasks.get(id);
        return task ? cloneTask(task) : null;
    }

    async findAll(): Promise<Task[]> {
        return Array.from(this.tasks.values(), cloneTask);
    }

    async save(task: Task): Promise<void> {
        if (!Number.isInteger(task.id) || task.id < 1 || task.id > this.lastId) {
            throw new Error(`Domain Invariant Violation: task id ${task.id} was not issued by this repository`);
        }
        if (task.title.trim().length === 0) {
            throw new Error('Domain Invariant Violation: Task must have a title');
        }
        if (!isTaskPriority(task.priority)) {
            throw new Error(`Domain Invariant Violation: unknown priority ${String(task.priority)}`);
        }
        this.tasks.set(task.id, cloneTask(task));
    }

    async delete(id: TaskId): Promise<void> {
        this.tasks.delete(id);
    }

    runExclusive<T>(work: () => Promise<T>): Promise<T> {
        const result = this.queue.then(work);
        // The caller sees the failure through `result`; the queue only needs to move on.
        this.queue = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
