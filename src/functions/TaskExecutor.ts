import type { ChannelJoiner } from '../interface/Collaborators'
import type { SessionContext } from '../interface/Session'
import { isTaskKind, Task, TaskHandler, TaskKind, TaskOutcome, TaskPolicy } from '../interface/Task'
import { FALLBACK_TASK_POLICY } from '../constants'
import type Retry from '../util/Retry'
import type { AdWatcher } from './AdWatcher'
import type { TaskCatalog } from './TaskCatalog'
import { ProcessTask } from './activities/ProcessTask'
import { Referral } from './activities/Referral'
import { RewardedAd } from './activities/RewardedAd'
import { Subscription } from './activities/Subscription'
import { Workers } from './Workers'

export type TaskHandlers = Record<TaskKind, TaskHandler>

export function policyFor(policies: Record<TaskKind, TaskPolicy>, kind: string): TaskPolicy {
    return isTaskKind(kind) ? policies[kind] : FALLBACK_TASK_POLICY
}

export function createTaskHandlers(
    ctx: SessionContext,
    catalog: TaskCatalog,
    joiner: ChannelJoiner,
    retry: Retry,
    watcher: AdWatcher
): TaskHandlers {
    const processTask = new ProcessTask(ctx, catalog)
    return {
        subscribe_telegram: new Subscription(ctx, joiner, retry, processTask),
        social_network: processTask,
        join_clan: processTask,
        homescreen: processTask,
        story: processTask,
        activate_mining_bot: processTask,
        adsgram: new RewardedAd(ctx, catalog, watcher),
        referrals: new Referral(ctx, catalog),
        promote_blockchain: processTask
    }
}

export class TaskExecutor extends Workers {
    private readonly catalog: TaskCatalog
    private readonly handlers: TaskHandlers
    private readonly retry: Retry

    constructor(ctx: SessionContext, catalog: TaskCatalog, handlers: TaskHandlers, retry: Retry) {
        super(ctx)
        this.catalog = catalog
        this.handlers = handlers
        this.retry = retry
    }

    policy(kind: string): TaskPolicy {
        return policyFor(this.config.tasks.policies, kind)
    }

    /**
     * Runs one task through the handler for its kind. Disabled kinds are never touched;
     * a task the server already reports as completed short-circuits to success.
     */
    async execute(taskId: number, kind: string): Promise<TaskOutcome> {
        const policy = this.policy(kind)
        if (!policy.enabled || !isTaskKind(kind)) {
            this.log.debug('TASKS', 'Task kind disabled', { task: taskId, kind })
            return { status: 'disabled' }
        }

        const task = await this.catalog.fetchTask(taskId)
        if (!task) {
            return { status: 'failed', reason: 'task detail unavailable' }
        }
        if (task.is_completed) {
            this.log.log('TASKS', 'Task is already completed', { title: task.title })
            return { status: 'completed' }
        }

        return this.handlers[kind].run(task, policy)
    }

    /**
     * Polls the task with its kind's attempts and delay. Running out of attempts is only
     * a warning: the server may still confirm it later.
     */
    async awaitCompletion(task: Task): Promise<boolean> {
        const policy = this.policy(task.type)
        const result = await this.retry.run(
            { attempts: policy.attempts, delayMs: policy.delay * 1000, delayFirst: true },
            async (attempt) => {
                if (await this.catalog.isCompleted(task.id)) return true
                this.log.debug('TASKS', 'Task not confirmed yet', { title: task.title, attempt: `${attempt}/${policy.attempts}` })
                return undefined
            }
        )

        if (result.ok) {
            this.log.success('TASKS', 'Task completed', { title: task.title, reward: task.reward })
            return true
        }
        this.log.warn('TASKS', 'Task processing timeout', { title: task.title, attempts: policy.attempts })
        return false
    }
}
