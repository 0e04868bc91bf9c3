import { isOk } from '../../client/BitApi'
import type { SessionContext } from '../../interface/Session'
import type { Task, TaskHandler, TaskOutcome } from '../../interface/Task'
import type { TaskCatalog } from '../TaskCatalog'
import { Workers } from '../Workers'

/**
 * Generic completion: ask the server to process the task, then re-read it.
 * An accepted but still incomplete task counts as submitted.
 */
export class ProcessTask extends Workers implements TaskHandler {
    private readonly catalog: TaskCatalog

    constructor(ctx: SessionContext, catalog: TaskCatalog) {
        super(ctx)
        this.catalog = catalog
    }

    async run(task: Task): Promise<TaskOutcome> {
        const res = await this.api.processTask(task.id)
        if (!isOk(res.status, [200, 202, 204])) {
            this.log.error('TASKS', 'Error processing task', { task: task.id, status: res.status })
            return { status: 'failed', reason: `process returned ${res.status}` }
        }

        const check = await this.catalog.fetchTask(task.id)
        if (check?.is_completed) {
            this.log.success('TASKS', 'Task completed', { title: check.title, reward: check.reward })
            return { status: 'completed' }
        }

        this.log.log('TASKS', 'Task sent for processing', { task: task.id })
        return { status: 'submitted' }
    }
}
