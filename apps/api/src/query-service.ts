import {
    NotFoundError,
    applyTaskFilter,
    systemClock,
    toAuditEventView,
    toTaskView,
    type AuditEventSource,
    type AuditEventView,
    type Clock,
    type TaskFilter,
    type TaskId,
    type TaskRepository,
    type TaskView,
} from '@tasklane/domain';

export class QueryService {
    constructor(
        private taskRepository: TaskRepository,
        private auditEvents: AuditEventSource,
        private clock: Clock = systemClock
    ) { }

    // Overdue is judged against the clock at the moment of the call.
    async getTasks(filter: TaskFilter = {}): Promise<TaskView[]> {
        const tasks = await this.taskRepository.findAll();
        return applyTaskFilter(tasks, filter, this.clock()).map(toTaskView);
    }

    async getTaskById(id: TaskId): Promise<TaskView> {
        const task = await this.taskRepository.findById(id);
        if (!task) throw new NotFoundError(id);
        return toTaskView(task);
    }

    getAuditEvents(): AuditEventView[] {
        return this.auditEvents.getEvents().map(toAuditEventView);
    }
}
