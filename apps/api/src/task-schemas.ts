import { z, type ZodError } from 'zod';
import { TaskPriority, ValidationError, type Task, type TaskFields } from '@tasklane/domain';

export const TITLE_MAX_LENGTH = 200;
export const TAG_MAX_LENGTH = 50;

const titleSchema = z.string().trim().min(1, 'Title is required').max(TITLE_MAX_LENGTH);
const prioritySchema = z.nativeEnum(TaskPriority);
// ISO-8601 only: a timestamp with `Z` or an explicit offset, or a bare date read as UTC midnight.
const dueDateSchema = z
    .union([z.string().datetime({ offset: true }), z.string().date()], {
        errorMap: () => ({ message: 'Expected an ISO-8601 date or date-time with offset' }),
    })
    .transform((value) => new Date(value))
    .nullable();
const tagsSchema = z
    .array(z.string().trim().min(1).max(TAG_MAX_LENGTH))
    .transform((tags) => [...new Set(tags)]);

export const createTaskSchema = z.object({
    title: titleSchema,
    description: z.string().default(''),
    completed: z.boolean().default(false),
    priority: prioritySchema.default(TaskPriority.MEDIUM),
    dueDate: dueDateSchema.default(null),
    tags: tagsSchema.default([]),
    locked: z.boolean().default(false),
});

// Full replacement: every writable field must be present (dueDate may be null).
export const replaceTaskSchema = z.object({
    title: titleSchema,
    description: z.string(),
    completed: z.boolean(),
    priority: prioritySchema,
    dueDate: dueDateSchema,
    tags: tagsSchema,
    locked: z.boolean(),
});

export const patchTaskSchema = replaceTaskSchema.partial();

export type CreateTaskInput = z.infer<typeof createTaskSchema>;
export type ReplaceTaskInput = z.infer<typeof replaceTaskSchema>;
export type PatchTaskInput = z.infer<typeof patchTaskSchema>;

const issuePath = (path: (string | number)[]): string => (path.length > 0 ? path.join('.') : 'body');

export const toValidationError = (error: ZodError): ValidationError => {
    const fields = [...new Set(error.issues.map((issue) => issuePath(issue.path.slice(0, 1))))];
    const message = error.issues.map((issue) => `${issuePath(issue.path)}: ${issue.message}`).join('; ');
    return new ValidationError(fields, message);
};

export const parseCreateTaskPayload = (payload: unknown): TaskFields => {
    const result = createTaskSchema.safeParse(payload);
    if (!result.success) throw toValidationError(result.error);
    return result.data;
};

export const parseReplaceTaskPayload = (payload: unknown): TaskFields => {
    const result = replaceTaskSchema.safeParse(payload);
    if (!result.success) throw toValidationError(result.error);
    return result.data;
};

export const parsePatchTaskPayload = (payload: unknown): PatchTaskInput => {
    const result = patchTaskSchema.safeParse(payload);
    if (!result.success) throw toValidationError(result.error);
    return result.data;
};

const sameTags = (left: string[], right: string[]): boolean =>
    left.length === right.length && left.every((tag, index) => tag === right[index]);

const sameDueDate = (left: Date | null, right: Date | null): boolean =>
    left === null || right === null ? left === right : left.getTime() === right.getTime();

/** Returns `task` itself when the patch changes nothing, so callers can skip the write. */
export const applyTaskPatch = (task: Task, patch: PatchTaskInput, updatedAt: Date): Task => {
    const next: Task = {
        ...task,
        title: patch.title !== undefined ? patch.title : task.title,
        description: patch.description !== undefined ? patch.description : task.description,
        completed: patch.completed !== undefined ? patch.completed : task.completed,
        priority: patch.priority !== undefined ? patch.priority : task.priority,
        dueDate: patch.dueDate !== undefined ? patch.dueDate : task.dueDate,
        tags: patch.tags !== undefined ? patch.tags : task.tags,
        locked: patch.locked !== undefined ? patch.locked : task.locked,
    };

    const unchanged =
        next.title === task.title &&
        next.description === task.description &&
        next.completed === task.completed &&
        next.priority === task.priority &&
        next.locked === task.locked &&
        sameDueDate(next.dueDate, task.dueDate) &&
        sameTags(next.tags, task.tags);

    return unchanged ? task : { ...next, updatedAt };
};
