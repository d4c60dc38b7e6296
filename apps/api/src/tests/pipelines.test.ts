import { describe, it, expect, beforeEach } from 'vitest';
import {
    ForbiddenError,
    LockedError,
    NotFoundError,
    TASK_LOCKED_MESSAGE,
    TaskPriority,
    ValidationError,
    type Task,
    type TaskId,
} from '@tasklane/domain';
import { InMemoryAppendOnlyLogger } from '@tasklane/audit';
import { InMemoryTaskRepository } from '@tasklane/infrastructure';
import { HardenedPolicyEngine } from '@tasklane/policy';
import { CreateTaskPipeline } from '../create-task-pipeline.js';
import { ReplaceTaskPipeline } from '../replace-task-pipeline.js';
import { PatchTaskPipeline } from '../patch-task-pipeline.js';
import { DeleteTaskPipeline } from '../delete-task-pipeline.js';
import { SetTaskLockPipeline } from '../set-task-lock-pipeline.js';

const CREATED_AT = new Date('2026-05-01T09:00:00.000Z');
const LATER = new Date('2026-05-02T10:30:00.000Z');

let now: Date;
let repo: InMemoryTaskRepository;
let auditLogger: InMemoryAppendOnlyLogger;
let create: CreateTaskPipeline;
let replace: ReplaceTaskPipeline;
let patch: PatchTaskPipeline;
let remove: DeleteTaskPipeline;
let setLock: SetTaskLockPipeline;

// Reads wait on a timer, so two commands that are not serialized would both load the same record.
class SlowReadTaskRepository extends InMemoryTaskRepository {
    async findById(id: TaskId): Promise<Task | null> {
        await new Promise<void>((resolve) => setTimeout(resolve, 10));
        return super.findById(id);
    }
}

const fullPayload = {
    title: 'Plan trip',
    description: 'Book train',
    completed: true,
    priority: 'low',
    dueDate: '2026-06-01T00:00:00.000Z',
    tags: ['travel'],
    locked: false,
};

beforeEach(() => {
    now = CREATED_AT;
    const clock = () => now;
    const engine = new HardenedPolicyEngine();
    repo = new InMemoryTaskRepository();
    auditLogger = new InMemoryAppendOnlyLogger({ echo: false });
    create = new CreateTaskPipeline(engine, auditLogger, repo, clock);
    replace = new ReplaceTaskPipeline(engine, auditLogger, repo, clock);
    patch = new PatchTaskPipeline(engine, auditLogger, repo, clock);
    remove = new DeleteTaskPipeline(engine, auditLogger, repo, clock);
    setLock = new SetTaskLockPipeline(engine, auditLogger, repo, clock);
});

describe('CreateTaskPipeline', () => {
    it('fills in defaults and stamps both timestamps', async () => {
        const task = await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk', priority: 'high' } });

        expect(task).toEqual({
            id: 1,
            title: 'Buy milk',
            description: '',
            completed: false,
            priority: TaskPriority.HIGH,
            dueDate: null,
            tags: [],
            locked: false,
            createdAt: CREATED_AT,
            updatedAt: CREATED_AT,
        });
        expect(await repo.findById(1)).toEqual(task);
    });

    it('rejects a missing title', async () => {
        const result = create.execute({ type: 'TASK_CREATE', payload: {} });
        await expect(result).rejects.toBeInstanceOf(ValidationError);
        await expect(result).rejects.toMatchObject({ fields: ['title'] });
    });

    it('reports every offending field', async () => {
        await expect(create.execute({ type: 'TASK_CREATE', payload: { priority: 'urgent' } })).rejects.toMatchObject({
            fields: ['title', 'priority'],
        });
    });

    it('rejects a body that is not an object', async () => {
        await expect(create.execute({ type: 'TASK_CREATE', payload: undefined })).rejects.toMatchObject({
            fields: ['body'],
        });
    });

    it('gives concurrent creates distinct ids', async () => {
        const tasks = await Promise.all(
            ['a', 'b', 'c', 'd'].map((title) => create.execute({ type: 'TASK_CREATE', payload: { title } }))
        );
        expect(tasks.map((task) => task.id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4]);
    });

    it('never reissues the id of a deleted task', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'first' } });
        await remove.execute({ type: 'TASK_DELETE', taskId: 1, payload: null });
        const second = await create.execute({ type: 'TASK_CREATE', payload: { title: 'second' } });
        expect(second.id).toBe(2);
    });

    it.each(['1', '12', 'March 7', '2026-07-01T08:00:00'])('rejects the due date %s', async (dueDate) => {
        await expect(create.execute({ type: 'TASK_CREATE', payload: { title: 'Pay rent', dueDate } })).rejects.toMatchObject({
            fields: ['dueDate'],
        });
    });

    it('reads a bare ISO date as UTC midnight', async () => {
        const task = await create.execute({ type: 'TASK_CREATE', payload: { title: 'Pay rent', dueDate: '2026-07-01' } });
        expect(task.dueDate).toEqual(new Date('2026-07-01T00:00:00.000Z'));
    });

    it('keeps an explicit offset', async () => {
        const task = await create.execute({
            type: 'TASK_CREATE',
            payload: { title: 'Pay rent', dueDate: '2026-07-01T08:00:00+02:00' },
        });
        expect(task.dueDate).toEqual(new Date('2026-07-01T06:00:00.000Z'));
    });

    it('runs the create through the policy engine before issuing an id', async () => {
        const denyCreates = new HardenedPolicyEngine([
            { id: 'allow-all', action: '*', effect: 'ALLOW' },
            { id: 'no-locked-creates', action: 'TASK_CREATE', effect: 'DENY', condition: 'locked=true', reason: 'No locked creates' },
        ]);
        const guarded = new CreateTaskPipeline(denyCreates, auditLogger, repo, () => now);

        const result = guarded.execute({ type: 'TASK_CREATE', payload: { title: 'Frozen', locked: true } });
        await expect(result).rejects.toBeInstanceOf(ForbiddenError);
        await expect(result).rejects.not.toBeInstanceOf(LockedError);
        await expect(result).rejects.toThrow('No locked creates');

        expect(await repo.findAll()).toEqual([]);
        expect(auditLogger.getEvents()[0]).toMatchObject({
            action: 'TASK_CREATE',
            resourceId: 'new-task',
            outcome: 'DENY',
            reason: 'No locked creates',
        });

        const allowed = await guarded.execute({ type: 'TASK_CREATE', payload: { title: 'Open' } });
        expect(allowed.id).toBe(1);
    });

    it('records the outcome in the audit log', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        const [event] = auditLogger.getEvents();
        expect(event).toMatchObject({ action: 'TASK_CREATE', resourceId: '1', outcome: 'ALLOW' });
    });
});

describe('ReplaceTaskPipeline', () => {
    it('overwrites everything but id and createdAt', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk', tags: ['shop'] } });
        now = LATER;

        const replaced = await replace.execute({ type: 'TASK_REPLACE', taskId: 1, payload: fullPayload });

        expect(replaced).toEqual({
            id: 1,
            title: 'Plan trip',
            description: 'Book train',
            completed: true,
            priority: TaskPriority.LOW,
            dueDate: new Date('2026-06-01T00:00:00.000Z'),
            tags: ['travel'],
            locked: false,
            createdAt: CREATED_AT,
            updatedAt: LATER,
        });
    });

    it('rejects a partial payload, naming the missing fields', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        await expect(
            replace.execute({ type: 'TASK_REPLACE', taskId: 1, payload: { title: 'Only a title' } })
        ).rejects.toMatchObject({ fields: ['description', 'completed', 'priority', 'dueDate', 'tags', 'locked'] });
    });

    it.each(['1', 'March 7'])('rejects the due date %s', async (dueDate) => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        await expect(
            replace.execute({ type: 'TASK_REPLACE', taskId: 1, payload: { ...fullPayload, dueDate } })
        ).rejects.toMatchObject({ fields: ['dueDate'] });
    });

    it('fails with NotFound for an unknown id', async () => {
        await expect(replace.execute({ type: 'TASK_REPLACE', taskId: 42, payload: fullPayload })).rejects.toBeInstanceOf(
            NotFoundError
        );
    });

    it('reports Locked before looking at an invalid payload', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Frozen', locked: true } });
        const result = replace.execute({ type: 'TASK_REPLACE', taskId: 1, payload: { priority: 'urgent' } });

        await expect(result).rejects.toBeInstanceOf(LockedError);
        await expect(result).rejects.toThrow(TASK_LOCKED_MESSAGE);
    });
});

describe('PatchTaskPipeline', () => {
    it('changes only the supplied fields', async () => {
        await create.execute({
            type: 'TASK_CREATE',
            payload: { title: 'Buy milk', description: '2 litres', dueDate: '2026-05-03T00:00:00.000Z' },
        });
        now = LATER;

        const patched = await patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true, dueDate: null } });

        expect(patched).toEqual({
            id: 1,
            title: 'Buy milk',
            description: '2 litres',
            completed: true,
            priority: TaskPriority.MEDIUM,
            dueDate: null,
            tags: [],
            locked: false,
            createdAt: CREATED_AT,
            updatedAt: LATER,
        });
    });

    it('validates the fields that are present', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        await expect(patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { title: '  ' } })).rejects.toMatchObject({
            fields: ['title'],
        });
    });

    it.each(['1', 'March 7'])('rejects the due date %s', async (dueDate) => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        await expect(patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { dueDate } })).rejects.toMatchObject({
            fields: ['dueDate'],
        });
    });

    it.each([{}, { completed: false, title: 'Buy milk', tags: [] }])('keeps updatedAt for a patch that changes nothing: %j', async (payload) => {
        const created = await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        now = LATER;

        const patched = await patch.execute({ type: 'TASK_PATCH', taskId: 1, payload });

        expect(patched).toEqual(created);
        expect((await repo.findById(1))?.updatedAt).toEqual(CREATED_AT);
    });

    it('leaves the stored task untouched when validation fails', async () => {
        const created = await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        await expect(
            patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true, priority: 'urgent' } })
        ).rejects.toBeInstanceOf(ValidationError);
        expect(await repo.findById(1)).toEqual(created);
    });

    it('rejects every change to a locked task, including clearing the flag', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Frozen', locked: true } });

        await expect(patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true } })).rejects.toThrow(
            TASK_LOCKED_MESSAGE
        );
        await expect(patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { locked: false } })).rejects.toBeInstanceOf(
            LockedError
        );
        expect((await repo.findById(1))?.locked).toBe(true);
    });

    it('audits the denial', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Frozen', locked: true } });
        await expect(patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true } })).rejects.toBeInstanceOf(
            LockedError
        );

        const events = auditLogger.getEvents();
        expect(events[1]).toMatchObject({
            action: 'TASK_PATCH',
            resourceId: '1',
            outcome: 'DENY',
            reason: TASK_LOCKED_MESSAGE,
            payload: { completed: true },
        });
    });
});

describe('DeleteTaskPipeline', () => {
    it('removes the task', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        await remove.execute({ type: 'TASK_DELETE', taskId: 1, payload: null });
        expect(await repo.findById(1)).toBeNull();
    });

    it('fails with NotFound for an unknown id', async () => {
        await expect(remove.execute({ type: 'TASK_DELETE', taskId: 9999, payload: null })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('refuses to delete a locked task', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Frozen', locked: true } });
        await expect(remove.execute({ type: 'TASK_DELETE', taskId: 1, payload: null })).rejects.toBeInstanceOf(LockedError);
        expect(await repo.findById(1)).not.toBeNull();
    });
});

describe('SetTaskLockPipeline', () => {
    it('unlocks a locked task so it can be changed again', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Frozen', locked: true } });
        now = LATER;

        const unlocked = await setLock.execute({ type: 'TASK_UNLOCK', taskId: 1, payload: null });
        expect(unlocked.locked).toBe(false);
        expect(unlocked.updatedAt).toEqual(LATER);

        const patched = await patch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true } });
        expect(patched.completed).toBe(true);
    });

    it('locks a task and is idempotent', async () => {
        await create.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });
        now = LATER;

        const locked = await setLock.execute({ type: 'TASK_LOCK', taskId: 1, payload: null });
        const again = await setLock.execute({ type: 'TASK_LOCK', taskId: 1, payload: null });

        expect(locked.locked).toBe(true);
        expect(again).toEqual(locked);
    });

    it('fails with NotFound for an unknown id', async () => {
        await expect(setLock.execute({ type: 'TASK_UNLOCK', taskId: 5, payload: null })).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('write serialization', () => {
    it('does not let a patch resurrect a task deleted alongside it', async () => {
        const engine = new HardenedPolicyEngine();
        const slowRepo = new SlowReadTaskRepository();
        const clock = () => now;
        const slowCreate = new CreateTaskPipeline(engine, auditLogger, slowRepo, clock);
        const slowDelete = new DeleteTaskPipeline(engine, auditLogger, slowRepo, clock);
        const slowPatch = new PatchTaskPipeline(engine, auditLogger, slowRepo, clock);
        await slowCreate.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });

        const [deleted, patched] = await Promise.allSettled([
            slowDelete.execute({ type: 'TASK_DELETE', taskId: 1, payload: null }),
            slowPatch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true } }),
        ]);

        expect(deleted.status).toBe('fulfilled');
        expect(patched.status).toBe('rejected');
        if (patched.status === 'rejected') {
            expect(patched.reason).toBeInstanceOf(NotFoundError);
        }
        expect(await slowRepo.findById(1)).toBeNull();
    });

    it('applies concurrent patches one after another', async () => {
        const engine = new HardenedPolicyEngine();
        const slowRepo = new SlowReadTaskRepository();
        const clock = () => now;
        const slowCreate = new CreateTaskPipeline(engine, auditLogger, slowRepo, clock);
        const slowPatch = new PatchTaskPipeline(engine, auditLogger, slowRepo, clock);
        await slowCreate.execute({ type: 'TASK_CREATE', payload: { title: 'Buy milk' } });

        await Promise.all([
            slowPatch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { completed: true } }),
            slowPatch.execute({ type: 'TASK_PATCH', taskId: 1, payload: { priority: 'high' } }),
        ]);

        expect(await slowRepo.findById(1)).toMatchObject({ completed: true, priority: TaskPriority.HIGH });
    });
});
