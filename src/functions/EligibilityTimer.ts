import { isOk } from '../client/BitApi'
import { ApiError } from '../util/Errors'
import { formatDuration } from '../util/Utils'
import { Workers } from './Workers'

export type Eligibility =
    | { eligible: true }
    | { eligible: false, waitSeconds: number, nextAvailable: Date }

/**
 * Gates the speedtest submission on the server-declared window.
 */
export class EligibilityTimer extends Workers {
    async checkTimedActivity(): Promise<Eligibility> {
        const res = await this.api.getSpeedtest()
        if (!isOk(res.status)) {
            throw new ApiError('Speedtest check failed', res.status)
        }

        const raw = res.data?.next_available
        const next = raw ? new Date(raw) : undefined
        const now = this.utils.now()

        if (next && !Number.isNaN(next.getTime()) && next.getTime() > now) {
            this.state.nextAvailable = next
            const waitSeconds = (next.getTime() - now) / 1000 + this.utils.randomInRange(this.config.sessionWaitDelay)
            this.log.log('SPEEDTEST', `Speedtest is not available. Need to wait ${formatDuration(waitSeconds)}`)
            return { eligible: false, waitSeconds, nextAvailable: next }
        }

        this.state.nextAvailable = undefined
        this.log.success('SPEEDTEST', 'Speedtest is available')
        return { eligible: true }
    }

    // Seconds until the stored window opens, 0 when there is none
    remainingSeconds(): number {
        const next = this.state.nextAvailable
        if (!next) return 0
        return Math.max(0, (next.getTime() - this.utils.now()) / 1000)
    }

    async submit(): Promise<number> {
        const { download: dl, upload: ul } = this.config.speedtest
        const download = this.utils.randomNumber(Math.ceil(dl.min), Math.floor(dl.max))
        const upload = this.utils.randomNumber(Math.ceil(ul.min), Math.floor(ul.max))

        const res = await this.api.submitSpeedtest(download, upload)
        if (!isOk(res.status)) {
            throw new ApiError('Submit speedtest failed', res.status)
        }

        const amount = Number(res.data?.amount ?? 0)
        this.log.success('SPEEDTEST', 'Speedtest completed', { download, upload, reward: amount })
        return Number.isFinite(amount) ? amount : 0
    }
}
