import { describe, expect, it } from 'vitest'

import { EligibilityTimer } from '../../src/functions/EligibilityTimer'
import { ApiError } from '../../src/util/Errors'
import { makeContext, START } from '../helpers'

describe('EligibilityTimer.checkTimedActivity', () => {
    it('waits for a future window plus the configured slack', async () => {
        const { ctx, server } = makeContext()
        const next = new Date(START + 100_000)
        server.on('GET', '/speedtest', { status: 200, data: { next_available: next.toISOString() } })
        const timer = new EligibilityTimer(ctx)

        const result = await timer.checkTimedActivity()

        // sessionWaitDelay is 1-80 s; the test clock picks the lower bound
        expect(result).toEqual({ eligible: false, waitSeconds: 101, nextAvailable: next })
        expect(ctx.state.nextAvailable).toEqual(next)
        expect(timer.remainingSeconds()).toBe(100)
    })

    it('is eligible when the window has passed and clears the stored one', async () => {
        const { ctx, server } = makeContext()
        ctx.state.nextAvailable = new Date(START - 5_000)
        server.on('GET', '/speedtest', { status: 200, data: { next_available: new Date(START - 1_000).toISOString() } })
        const timer = new EligibilityTimer(ctx)

        expect(await timer.checkTimedActivity()).toEqual({ eligible: true })
        expect(ctx.state.nextAvailable).toBeUndefined()
        expect(timer.remainingSeconds()).toBe(0)
    })

    it('is eligible without a window', async () => {
        const { ctx, server } = makeContext()
        server.on('GET', '/speedtest', { status: 200, data: { next_available: null } })
        expect(await new EligibilityTimer(ctx).checkTimedActivity()).toEqual({ eligible: true })
    })

    it('throws a transient error on a failed check', async () => {
        const { ctx, server } = makeContext()
        server.on('GET', '/speedtest', { status: 503 })

        const check = new EligibilityTimer(ctx).checkTimedActivity()
        await expect(check).rejects.toBeInstanceOf(ApiError)
        await expect(check).rejects.toThrow('Speedtest check failed (status 503)')
    })
})

describe('EligibilityTimer.submit', () => {
    it('posts random integers from the configured ranges', async () => {
        const { ctx, server } = makeContext()
        server.on('POST', '/speedtest', { status: 200, data: { amount: 12.5 } })

        expect(await new EligibilityTimer(ctx).submit()).toBe(12.5)
        expect(server.calls[0]?.data).toEqual({ download: 50, upload: 10 })
    })

    it('throws when the submission is rejected', async () => {
        const { ctx, server } = makeContext()
        server.on('POST', '/speedtest', { status: 400 })
        await expect(new EligibilityTimer(ctx).submit()).rejects.toThrow('Submit speedtest failed (status 400)')
    })
})
