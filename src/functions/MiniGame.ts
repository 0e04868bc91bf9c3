import { isOk } from '../client/BitApi'
import { DELAYS } from '../constants'
import type { DurovJumpPayload } from '../interface/Api'
import { InvalidSession, isAbortError, shortErr } from '../util/Errors'
import { Workers } from './Workers'

export class MiniGame extends Workers {
    async tickets(): Promise<number> {
        const res = await this.api.getMe()
        if (!isOk(res.status)) {
            this.log.error('DUROV-JUMP', 'Failed to check tickets', { status: res.status })
            return 0
        }
        const tickets = Number(res.data?.tickets ?? 0)
        return Number.isFinite(tickets) ? tickets : 0
    }

    /**
     * Plays one round: waits out a random game duration, then submits a random score.
     * Resolves false when the server did not accept the round.
     */
    async play(): Promise<boolean> {
        const { duration, score } = this.config.durovJump
        const seconds = this.utils.randomInRange(duration)
        this.log.log('DUROV-JUMP', 'Starting game', { duration: Math.round(seconds) })

        const startedAt = new Date(this.utils.now())
        await this.utils.waitSeconds(seconds)
        const endedAt = new Date(this.utils.now())

        const payload: DurovJumpPayload = {
            score: this.utils.randomNumber(score.min, score.max),
            start_at: startedAt.toISOString(),
            end_at: endedAt.toISOString()
        }

        try {
            const res = await this.api.submitDurovJump(payload)
            if (!isOk(res.status)) {
                this.log.error('DUROV-JUMP', 'Failed to submit score', { status: res.status })
                if (res.status === 422) {
                    this.log.error('DUROV-JUMP', 'Error details', { details: JSON.stringify(res.data) })
                }
                return false
            }

            const reward = Number(res.data?.amount ?? 0)
            if (reward > 0) {
                this.log.success('DUROV-JUMP', 'Game completed', { score: payload.score, reward })
            } else {
                this.log.warn('DUROV-JUMP', 'Game completed but received no reward', { score: payload.score })
            }
            return true
        } catch (error) {
            if (isAbortError(error) || error instanceof InvalidSession) throw error
            this.log.error('DUROV-JUMP', 'Error in game', { reason: shortErr(error) }, error)
            return false
        }
    }

    // Plays while tickets remain; a rejected round ends the run. Returns rounds played.
    async run(): Promise<number> {
        if (!this.config.durovJump.enabled) return 0

        let tickets = await this.tickets()
        if (tickets <= 0) return 0
        this.log.log('DUROV-JUMP', 'Found tickets', { tickets })

        let played = 0
        while (tickets > 0) {
            if (!await this.play()) break
            played++
            await this.pause(DELAYS.TASK_PACING)
            tickets = await this.tickets()
        }
        return played
    }
}
