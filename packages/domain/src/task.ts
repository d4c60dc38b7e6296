export type TaskId = number;

export enum TaskPriority {
    LOW = 'low',
    MEDIUM = 'medium',
    HIGH = 'high',
}

export const TASK_PRIORITIES: readonly TaskPriority[] = [TaskPriority.LOW, TaskPriority.MEDIUM, TaskPriority.HIGH];

export const isTaskPriority = (value: unknown): value is TaskPriority =>
    typeof value === 'string' && TASK_PRIORITIES.some((priority) => priority === value);

export interface Task {
    id: TaskId;
    title: string;
    description: string;
    completed: boolean;
    priority: TaskPriority;
    dueDate: Date | null;
    tags: string[];
    locked: boolean;
    createdAt: Date;
    updatedAt: Date;
}

/** The writable part of a task: everything except identity and timestamps. */
export type TaskFields = Omit<Task, 'id' | 'createdAt' | 'updatedAt'>;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const cloneTask = (task: Task): Task => ({
    ...task,
    tags: [...task.tags],
    dueDate: task.dueDate ? new Date(task.dueDate.getTime()) : null,
    createdAt: new Date(task.createdAt.getTime()),
    updatedAt: new Date(task.updatedAt.getTime()),
});

export interface TaskRepository {
    nextId(): Promise<TaskId>;
    findById(id: TaskId): Promise<Task | null>;
    /** Every stored task, ascending by id. */
    findAll(): Promise<Task[]>;
    save(task: Task): Promise<void>;
    delete(id: TaskId): Promise<void>;
    /**
     * Runs `work` with exclusive access to the store. Calls queue behind each other in
     * arrival order; a rejection from one does not block the next.
     */
    runExclusive<T>(work: () => Promise<T>): Promise<T>;
}
