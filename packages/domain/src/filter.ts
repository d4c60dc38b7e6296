import { type Task, type TaskPriority, isTaskPriority } from './task.js';

export interface TaskFilter {
    completed?: boolean;
    priority?: TaskPriority;
    /** Every listed tag must be present on the task. */
    tags?: string[];
    /** `true` keeps tasks whose due date has passed, `false` keeps the rest. */
    overdue?: boolean;
}

export type TaskPredicate = (task: Task) => boolean;

export const isOverdue = (task: Task, now: Date): boolean =>
    task.dueDate !== null && task.dueDate.getTime() < now.getTime();

export const buildTaskPredicate = (filter: TaskFilter, now: Date): TaskPredicate => {
    const predicates: TaskPredicate[] = [];

    if (filter.completed !== undefined) {
        const completed = filter.completed;
        predicates.push((task) => task.completed === completed);
    }
    if (filter.priority !== undefined) {
        const priority = filter.priority;
        predicates.push((task) => task.priority === priority);
    }
    if (filter.tags && filter.tags.length > 0) {
        const tags = filter.tags;
        predicates.push((task) => tags.every((tag) => task.tags.includes(tag)));
    }
    if (filter.overdue !== undefined) {
        const overdue = filter.overdue;
        predicates.push((task) => isOverdue(task, now) === overdue);
    }

    return (task) => predicates.every((predicate) => predicate(task));
};

export const applyTaskFilter = (tasks: Task[], filter: TaskFilter, now: Date): Task[] =>
    tasks.filter(buildTaskPredicate(filter, now));

const firstString = (value: unknown): string | undefined => {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) {
        const first: unknown = value[0];
        return typeof first === 'string' ? first : undefined;
    }
    return undefined;
};

const parseBoolean = (value: unknown): boolean | undefined => {
    const raw = firstString(value)?.trim().toLowerCase();
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    return undefined;
};

const parseTags = (value: unknown): string[] | undefined => {
    const raw: unknown[] = Array.isArray(value) ? value : [value];
    const tags = raw
        .filter((entry): entry is string => typeof entry === 'string')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    return tags.length > 0 ? tags : undefined;
};

/**
 * Reads filter criteria out of a parsed query string. Unknown keys and values that do not
 * parse are dropped rather than rejected.
 */
export const parseTaskFilter = (query: Record<string, unknown>): TaskFilter => {
    const filter: TaskFilter = {};

    const completed = parseBoolean(query.completed);
    if (completed !== undefined) filter.completed = completed;

    const priority = firstString(query.priority)?.trim().toLowerCase();
    if (isTaskPriority(priority)) filter.priority = priority;

    const tags = parseTags(query.tags);
    if (tags) filter.tags = tags;

    const overdue = parseBoolean(query.overdue);
    if (overdue !== undefined) filter.overdue = overdue;

    return filter;
};
