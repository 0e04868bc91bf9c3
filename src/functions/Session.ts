import { isOk } from '../client/BitApi'
import { DELAYS } from '../constants'
import type { ChannelJoiner, ProxyProvider, TokenSource } from '../interface/Collaborators'
import type { SessionContext } from '../interface/Session'
import type { TaskOutcome } from '../interface/Task'
import type { AxiosClientFactory } from '../util/Axios'
import { InvalidSession, isAbortError, shortErr } from '../util/Errors'
import Retry from '../util/Retry'
import { formatDuration } from '../util/Utils'
import type { VoucherLedger } from '../util/VoucherLedger'
import { AdWatcher } from './AdWatcher'
import { ClanManager } from './Clan'
import { CredentialManager } from './Credentials'
import { DailyCheckIn } from './DailyCheckIn'
import { EligibilityTimer } from './EligibilityTimer'
import { MiniGame } from './MiniGame'
import { ProxyGuardian } from './ProxyGuardian'
import { TaskCatalog } from './TaskCatalog'
import { createTaskHandlers, TaskExecutor } from './TaskExecutor'
import { VoucherProcessor } from './Vouchers'
import { Workers } from './Workers'

export interface SessionDependencies {
    tokenSource: TokenSource
    channelJoiner: ChannelJoiner
    proxyProvider: ProxyProvider
    createClient: AxiosClientFactory
    ledger: VoucherLedger
}

export type IterationOutcome = 'proxy-unavailable' | 'waiting' | 'submitted' | 'backoff'

/**
 * The per-account control loop. Runs until the session signal aborts or a
 * session-fatal error ends it; anything else is logged and backed off.
 */
export class Session extends Workers {
    readonly checkIn: DailyCheckIn
    readonly credentials: CredentialManager
    readonly guardian: ProxyGuardian
    readonly clan: ClanManager
    readonly catalog: TaskCatalog
    readonly executor: TaskExecutor
    readonly timer: EligibilityTimer
    readonly miniGame: MiniGame
    readonly vouchers: VoucherProcessor

    constructor(ctx: SessionContext, deps: SessionDependencies) {
        super(ctx)
        const retry = new Retry(ctx.utils)

        this.checkIn = new DailyCheckIn(ctx)
        this.credentials = new CredentialManager(ctx, deps.tokenSource, this.checkIn)
        this.guardian = new ProxyGuardian(ctx, deps.proxyProvider, deps.createClient)
        this.clan = new ClanManager(ctx)
        this.catalog = new TaskCatalog(ctx)
        this.executor = new TaskExecutor(
            ctx,
            this.catalog,
            createTaskHandlers(ctx, this.catalog, deps.channelJoiner, retry, new AdWatcher(ctx)),
            retry
        )
        this.timer = new EligibilityTimer(ctx)
        this.miniGame = new MiniGame(ctx)
        this.vouchers = new VoucherProcessor(ctx, deps.ledger)
    }

    get context(): SessionContext {
        return this.ctx
    }

    async run(): Promise<void> {
        try {
            const delay = this.utils.randomInRange({ min: 1, max: this.config.sessionStartDelay })
            this.log.log('MAIN', `Session will start in ${formatDuration(delay)}`)
            await this.utils.waitSeconds(delay)

            while (!this.utils.aborted) {
                await this.iterate()
            }
        } catch (error) {
            if (isAbortError(error)) {
                this.log.log('MAIN', 'Session stopped')
                return
            }
            if (error instanceof InvalidSession) {
                this.log.error('MAIN', 'Session is no longer valid, stopping', { reason: error.message }, error)
                return
            }
            throw error
        } finally {
            this.state.http.close()
        }
    }

    async iterate(): Promise<IterationOutcome> {
        try {
            if (!await this.guardian.verifyOrReplace()) {
                this.log.warn('PROXY', 'Failed to find working proxy', { sleep: formatDuration(DELAYS.PROXY_UNAVAILABLE) })
                await this.utils.waitSeconds(DELAYS.PROXY_UNAVAILABLE)
                return 'proxy-unavailable'
            }

            if (await this.credentials.ensureFresh()) {
                await this.onRenewal()
            }

            if (await this.checkIn.run()) {
                await this.pause(DELAYS.TASK_PACING)
            }

            await this.processTasks()
            await this.pause(DELAYS.TASK_PACING)

            const eligibility = await this.timer.checkTimedActivity()
            if (!eligibility.eligible) {
                await this.miniGame.run()
                await this.vouchers.run()

                const seconds = this.timer.remainingSeconds() + this.utils.randomInRange(DELAYS.EXTRA_WAIT_JITTER)
                this.log.log('MAIN', `Waiting ${formatDuration(seconds)} before next attempt`)
                await this.utils.waitSeconds(seconds)
                return 'waiting'
            }

            const seconds = this.utils.randomInRange(DELAYS.PRE_SUBMIT)
            this.log.log('SPEEDTEST', `Waiting ${formatDuration(seconds)} before submitting results`)
            await this.utils.waitSeconds(seconds)
            await this.timer.submit()
            return 'submitted'
        } catch (error) {
            if (isAbortError(error) || error instanceof InvalidSession) throw error

            const seconds = this.utils.randomInRange(DELAYS.ERROR_BACKOFF)
            this.log.error('MAIN', `Unknown error, sleeping for ${formatDuration(seconds)}`, { reason: shortErr(error) }, error)
            await this.utils.waitSeconds(seconds)
            return 'backoff'
        }
    }

    /**
     * Runs every enabled actionable task once. A task that throws is logged and
     * skipped; the rest of the list still runs.
     */
    async processTasks(): Promise<TaskOutcome[]> {
        const tasks = await this.catalog.discover()
        const outcomes: TaskOutcome[] = []

        for (const task of tasks) {
            if (!this.executor.policy(task.type).enabled) continue
            await this.pause(DELAYS.TASK_PACING)

            let outcome: TaskOutcome
            try {
                outcome = await this.executor.execute(task.id, task.type)
            } catch (error) {
                if (isAbortError(error) || error instanceof InvalidSession) throw error
                this.log.error('TASKS', 'Error executing task', { task: task.id, reason: shortErr(error) }, error)
                outcome = { status: 'failed', reason: shortErr(error) }
            }
            outcomes.push(outcome)

            if (outcome.status === 'submitted') {
                await this.executor.awaitCompletion(task)
            } else if (outcome.reason === 'unauthorized') {
                // Expire the token so the next iteration renews it
                this.state.tokenIssuedAt = 0
            }
        }

        return outcomes
    }

    private async onRenewal(): Promise<void> {
        const res = await this.api.getMe()
        if (!isOk(res.status) || !res.data) {
            throw new InvalidSession(`Failed to get user info (status ${res.status})`)
        }

        const me = res.data
        if (typeof me.telegram_id === 'number') this.state.telegramId = me.telegram_id
        this.state.clanId = me.clan_id ?? undefined
        this.log.success('MAIN', 'Logged in', { username: me.username ?? 'None' })

        await this.clan.ensureMembership()
    }
}
