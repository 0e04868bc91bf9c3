import { isOk } from '../client/BitApi'
import type { Task } from '../interface/Task'
import { Workers } from './Workers'

/**
 * "Invite 5 friends" -> 5. The count is the digits of the second whitespace-separated
 * token; undefined when that token is missing or has no digits.
 */
export function requiredReferralsFromTitle(title: string): number | undefined {
    const token = title.trim().split(/\s+/)[1]
    if (!token) return undefined
    const digits = token.replace(/\D/g, '')
    return digits ? Number.parseInt(digits, 10) : undefined
}

export class TaskCatalog extends Workers {
    /**
     * Actionable tasks in server order: completed tasks dropped, referral tasks kept only
     * once the account has enough referrals. Empty on a failed fetch.
     */
    async discover(): Promise<Task[]> {
        const res = await this.api.getTasks()
        if (!isOk(res.status) || !Array.isArray(res.data)) {
            this.log.error('TASKS', 'Error getting tasks', { status: res.status })
            return []
        }

        const actionable: Task[] = []
        let currentReferrals: number | undefined

        for (const task of res.data) {
            if (task.is_completed) continue

            if (task.type !== 'referrals') {
                actionable.push(task)
                continue
            }

            const required = requiredReferralsFromTitle(String(task.title ?? ''))
            if (required === undefined) continue

            if (currentReferrals === undefined) {
                currentReferrals = await this.getReferralCount()
                this.log.log('TASKS', 'Found referrals', { referrals: currentReferrals })
            }
            if (currentReferrals >= required) {
                actionable.push(task)
                this.log.log('TASKS', 'Found a completable referral task', { progress: `${currentReferrals}/${required}` })
            }
        }

        this.state.tasks = actionable
        return actionable
    }

    // 0 on failure, so referral tasks simply stay hidden
    async getReferralCount(): Promise<number> {
        const res = await this.api.getReferrals()
        if (!isOk(res.status)) {
            this.log.error('TASKS', 'Failed to get referrals', { status: res.status })
            return 0
        }
        const total = Number(res.data?.total ?? 0)
        return Number.isFinite(total) ? total : 0
    }

    async fetchTask(taskId: number): Promise<Task | undefined> {
        const res = await this.api.getTask(taskId)
        if (!isOk(res.status) || !res.data) {
            this.log.error('TASKS', 'Failed to get task info', { task: taskId, status: res.status })
            return undefined
        }
        return res.data
    }

    async isCompleted(taskId: number): Promise<boolean> {
        const task = await this.fetchTask(taskId)
        return task?.is_completed === true
    }
}
