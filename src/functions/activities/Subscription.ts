import type { ChannelJoiner } from '../../interface/Collaborators'
import type { SessionContext } from '../../interface/Session'
import type { Task, TaskHandler, TaskOutcome, TaskPolicy } from '../../interface/Task'
import type Retry from '../../util/Retry'
import { shortErr } from '../../util/Errors'
import { channelOf } from '../../util/Channels'
import { Workers } from '../Workers'
import type { ProcessTask } from './ProcessTask'

export class Subscription extends Workers implements TaskHandler {
    private readonly joiner: ChannelJoiner
    private readonly retry: Retry
    private readonly processTask: ProcessTask

    constructor(ctx: SessionContext, joiner: ChannelJoiner, retry: Retry, processTask: ProcessTask) {
        super(ctx)
        this.joiner = joiner
        this.retry = retry
        this.processTask = processTask
    }

    async run(task: Task, policy: TaskPolicy): Promise<TaskOutcome> {
        const channel = channelOf(task)
        const result = await this.retry.run(
            { attempts: policy.attempts, delayMs: policy.delay * 1000 },
            async () => (await this.joiner.joinChannel(task)) ? true : undefined,
            (error, attempt) => this.log.error('SUBSCRIBE', 'Error executing subscription task', { attempt, reason: shortErr(error) }, error)
        )

        if (!result.ok) {
            this.log.warn('SUBSCRIBE', 'Failed to complete subscription task', { channel, attempts: result.attempts })
            return { status: 'failed', reason: 'channel not joined' }
        }

        this.log.success('SUBSCRIBE', 'Channel subscription confirmed', { channel })
        return this.processTask.run(task)
    }
}
