import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import {
    ForbiddenError,
    NotFoundError,
    ValidationError,
    parseTaskFilter,
    systemClock,
    toTaskView,
    type Clock,
    type PolicyEngine,
    type TaskId,
    type TaskRepository,
} from '@tasklane/domain';
import { InMemoryAppendOnlyLogger, type AppendOnlyAuditLogger } from '@tasklane/audit';
import { InMemoryTaskRepository } from '@tasklane/infrastructure';
import { HardenedPolicyEngine } from '@tasklane/policy';
import { DEFAULT_CONFIG } from './config.js';
import { QueryService } from './query-service.js';
import { CreateTaskPipeline } from './create-task-pipeline.js';
import { ReplaceTaskPipeline } from './replace-task-pipeline.js';
import { PatchTaskPipeline } from './patch-task-pipeline.js';
import { DeleteTaskPipeline } from './delete-task-pipeline.js';
import { SetTaskLockPipeline } from './set-task-lock-pipeline.js';

export interface AppOptions {
    repository?: TaskRepository;
    auditLogger?: AppendOnlyAuditLogger;
    policyEngine?: PolicyEngine;
    clock?: Clock;
    jsonBodyLimit?: string;
}

export const parseTaskId = (raw: string): TaskId => {
    const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
    if (!Number.isSafeInteger(id) || id < 1) throw new NotFoundError(raw);
    return id;
};

const errorStatus = (error: unknown): number | null => {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return null;
};

export const sendError = (res: Response, error: unknown): void => {
    if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, fields: error.fields });
        return;
    }
    if (error instanceof NotFoundError) {
        res.status(404).json({ error: error.message });
        return;
    }
    if (error instanceof ForbiddenError) {
        res.status(403).json({ error: error.message });
        return;
    }

    // body-parser failures (malformed JSON, oversized body) carry a 4xx status
    const status = errorStatus(error);
    if (status !== null && status >= 400 && status < 500) {
        res.status(status).json({ error: error instanceof Error ? error.message : 'Bad Request' });
        return;
    }

    console.error('[API] Unhandled error', error);
    res.status(500).json({ error: 'Internal Server Error' });
};

export const createApp = (options: AppOptions = {}): Express => {
    const taskRepo = options.repository ?? new InMemoryTaskRepository();
    const auditLogger = options.auditLogger ?? new InMemoryAppendOnlyLogger();
    const policyEngine = options.policyEngine ?? new HardenedPolicyEngine();
    const clock = options.clock ?? systemClock;

    const queryService = new QueryService(taskRepo, auditLogger, clock);

    // Pipelines
    const createPipeline = new CreateTaskPipeline(policyEngine, auditLogger, taskRepo, clock);
    const replacePipeline = new ReplaceTaskPipeline(policyEngine, auditLogger, taskRepo, clock);
    const patchPipeline = new PatchTaskPipeline(policyEngine, auditLogger, taskRepo, clock);
    const deletePipeline = new DeleteTaskPipeline(policyEngine, auditLogger, taskRepo, clock);
    const lockPipeline = new SetTaskLockPipeline(policyEngine, auditLogger, taskRepo, clock);

    const app = express();
    app.use(cors());
    app.use(express.json({ limit: options.jsonBodyLimit ?? DEFAULT_CONFIG.jsonBodyLimit }));

    // Health-check / root endpoint
    app.get('/', (_req, res) => {
        res.json({ status: 'ok', message: 'Tasklane API is running' });
    });

    // --- Query Endpoints ---

    app.get('/tasks', async (req, res) => {
        try {
            const tasks = await queryService.getTasks(parseTaskFilter(req.query));
            res.json(tasks);
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/tasks/:id', async (req, res) => {
        try {
            const task = await queryService.getTaskById(parseTaskId(req.params.id));
            res.json(task);
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/audit-events', (_req, res) => {
        res.json(queryService.getAuditEvents());
    });

    // --- Command Endpoints ---

    app.post('/tasks', async (req, res) => {
        try {
            const task = await createPipeline.execute({ type: 'TASK_CREATE', payload: req.body });
            res.status(201).json(toTaskView(task));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.put('/tasks/:id', async (req, res) => {
        try {
            const task = await replacePipeline.execute({
                type: 'TASK_REPLACE',
                taskId: parseTaskId(req.params.id),
                payload: req.body,
            });
            res.json(toTaskView(task));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.patch('/tasks/:id', async (req, res) => {
        try {
            const task = await patchPipeline.execute({
                type: 'TASK_PATCH',
                taskId: parseTaskId(req.params.id),
                payload: req.body,
            });
            res.json(toTaskView(task));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.delete('/tasks/:id', async (req, res) => {
        try {
            await deletePipeline.execute({ type: 'TASK_DELETE', taskId: parseTaskId(req.params.id), payload: null });
            res.status(204).send();
        } catch (e) {
            sendError(res, e);
        }
    });

    app.post('/tasks/:id/lock', async (req, res) => {
        try {
            const task = await lockPipeline.execute({ type: 'TASK_LOCK', taskId: parseTaskId(req.params.id), payload: null });
            res.json(toTaskView(task));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.post('/tasks/:id/unlock', async (req, res) => {
        try {
            const task = await lockPipeline.execute({ type: 'TASK_UNLOCK', taskId: parseTaskId(req.params.id), payload: null });
            res.json(toTaskView(task));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.use((_req, res) => {
        res.status(404).json({ error: 'Not Found' });
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        sendError(res, error);
    });

    return app;
};
