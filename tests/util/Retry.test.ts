import { describe, expect, it, vi } from 'vitest'

import { AbortError } from '../../src/util/Errors'
import Retry from '../../src/util/Retry'
import { InstantUtil } from '../helpers'

describe('Retry', () => {
    it('returns the first defined value and waits between attempts', async () => {
        const utils = new InstantUtil()
        const attempt = vi.fn(async (n: number) => n === 3 ? 'done' : undefined)

        const result = await new Retry(utils).run({ attempts: 5, delayMs: 1000 }, attempt)

        expect(result).toEqual({ ok: true, value: 'done', attempts: 3 })
        expect(attempt).toHaveBeenCalledTimes(3)
        expect(utils.waits).toEqual([1000, 1000])
    })

    it('reports exhaustion after the configured attempts', async () => {
        const utils = new InstantUtil()
        const result = await new Retry(utils).run({ attempts: 3, delayMs: 500 }, async () => undefined)

        expect(result).toEqual({ ok: false, attempts: 3, lastError: undefined })
        expect(utils.waits).toEqual([500, 500])
    })

    it('waits before the first attempt when asked to', async () => {
        const utils = new InstantUtil()
        await new Retry(utils).run({ attempts: 2, delayMs: 3000, delayFirst: true }, async () => undefined)
        expect(utils.waits).toEqual([3000, 3000])
    })

    it('counts thrown errors as failed attempts', async () => {
        const onError = vi.fn()
        const failure = new Error('flaky')
        const result = await new Retry(new InstantUtil()).run(
            { attempts: 2, delayMs: 0 },
            async () => { throw failure },
            onError
        )

        expect(result).toEqual({ ok: false, attempts: 2, lastError: failure })
        expect(onError).toHaveBeenCalledWith(failure, 1)
        expect(onError).toHaveBeenCalledWith(failure, 2)
    })

    it('lets cancellation escape', async () => {
        const run = new Retry(new InstantUtil()).run({ attempts: 3, delayMs: 0 }, async () => { throw new AbortError() })
        await expect(run).rejects.toBeInstanceOf(AbortError)
    })

    it('always makes at least one attempt', async () => {
        const attempt = vi.fn(async () => undefined)
        const result = await new Retry(new InstantUtil()).run({ attempts: 0, delayMs: 0 }, attempt)
        expect(result.attempts).toBe(1)
        expect(attempt).toHaveBeenCalledTimes(1)
    })
})
