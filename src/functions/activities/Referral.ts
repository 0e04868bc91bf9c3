import type { SessionContext } from '../../interface/Session'
import type { Task, TaskHandler, TaskOutcome } from '../../interface/Task'
import type { TaskCatalog } from '../TaskCatalog'
import { Workers } from '../Workers'

/**
 * Nothing to submit: the server completes the task itself once the account has the
 * required referrals, so this only checks the threshold.
 */
export class Referral extends Workers implements TaskHandler {
    private readonly catalog: TaskCatalog

    constructor(ctx: SessionContext, catalog: TaskCatalog) {
        super(ctx)
        this.catalog = catalog
    }

    async run(task: Task): Promise<TaskOutcome> {
        const required = Number(task.additional_data?.referrals_count ?? 0)
        if (!Number.isFinite(required) || required <= 0) {
            this.log.warn('REFERRALS', 'No required referrals count in task data', { task: task.id })
            return { status: 'failed', reason: 'missing referrals_count' }
        }

        const current = await this.catalog.getReferralCount()
        const progress = `${current}/${required}`
        if (current >= required) {
            this.log.success('REFERRALS', 'Referral task can be completed', { progress })
            return { status: 'submitted' }
        }

        this.log.log('REFERRALS', 'Not enough referrals to complete task', { progress })
        return { status: 'failed', reason: `referrals ${progress}` }
    }
}
