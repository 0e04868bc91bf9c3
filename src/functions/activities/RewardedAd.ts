import type { SessionContext } from '../../interface/Session'
import type { Task, TaskHandler, TaskOutcome } from '../../interface/Task'
import { ADS, DELAYS } from '../../constants'
import type { AdWatcher } from '../AdWatcher'
import type { TaskCatalog } from '../TaskCatalog'
import { Workers } from '../Workers'

export function viewsNeeded(task: Task): number {
    const views = Number(task.additional_data?.views)
    return Number.isInteger(views) && views > 0 ? views : ADS.DEFAULT_VIEWS
}

export class RewardedAd extends Workers implements TaskHandler {
    private readonly catalog: TaskCatalog
    private readonly watcher: AdWatcher

    constructor(ctx: SessionContext, catalog: TaskCatalog, watcher: AdWatcher) {
        super(ctx)
        this.catalog = catalog
        this.watcher = watcher
    }

    async run(task: Task): Promise<TaskOutcome> {
        const views = viewsNeeded(task)
        this.log.log('ADS', 'Starting task to watch ads', { task: task.id, views })

        for (let i = 1; i <= views; i++) {
            this.log.log('ADS', 'Watching ad', { progress: `${i}/${views}` })

            const result = await this.watcher.watch()
            if (result.state === 'failed') {
                return { status: 'failed', reason: result.unauthorized ? 'unauthorized' : result.reason }
            }

            if (await this.catalog.isCompleted(task.id)) {
                this.log.success('ADS', 'Ad task completed', { views: i })
                return { status: 'completed' }
            }

            await this.utils.waitSeconds(DELAYS.AD_VIEW_GAP)
        }

        if (await this.catalog.isCompleted(task.id)) {
            this.log.success('ADS', 'Ad task completed', { views })
            return { status: 'completed' }
        }

        this.log.warn('ADS', 'Task was not marked as completed after all views', { views })
        return { status: 'failed', reason: 'not completed after all views' }
    }
}
