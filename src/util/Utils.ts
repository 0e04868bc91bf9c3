import { AbortError } from './Errors'
import type { Range } from '../interface/Config'

// Longest delay setTimeout honours; anything above fires almost at once
const MAX_TIMEOUT_MS = 2 ** 31 - 1

export default class Util {
    private readonly signal: AbortSignal | undefined

    constructor(signal?: AbortSignal) {
        this.signal = signal
    }

    get aborted(): boolean {
        return this.signal?.aborted ?? false
    }

    now(): number {
        return Date.now()
    }

    /**
     * Sleeps for `ms`. Rejects with AbortError as soon as the session signal fires.
     */
    wait(ms: number): Promise<void> {
        const signal = this.signal
        if (signal?.aborted) return Promise.reject(new AbortError())
        if (ms > MAX_TIMEOUT_MS) {
            return this.wait(MAX_TIMEOUT_MS).then(() => this.wait(ms - MAX_TIMEOUT_MS))
        }

        return new Promise<void>((resolve, reject) => {
            const onAbort = () => {
                clearTimeout(timer)
                reject(new AbortError())
            }
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort)
                resolve()
            }, Math.max(0, ms))
            signal?.addEventListener('abort', onAbort, { once: true })
        })
    }

    async waitSeconds(seconds: number): Promise<void> {
        await this.wait(Math.round(seconds * 1000))
    }

    // Inclusive on both ends
    randomNumber(min: number, max: number): number {
        if (min > max) [min, max] = [max, min]
        return Math.floor(Math.random() * (max - min + 1)) + min
    }

    randomFloat(min: number, max: number): number {
        if (min > max) [min, max] = [max, min]
        return Math.random() * (max - min) + min
    }

    randomInRange(range: Range): number {
        return this.randomFloat(range.min, range.max)
    }

    shuffleArray<T>(arr: T[]): T[] {
        const out = [...arr]
        for (let i = out.length - 1; i > 0; i--) {
            const j = Math.floor(Math.random() * (i + 1))
            const a = out[i]
            const b = out[j]
            if (a === undefined || b === undefined) continue
            out[i] = b
            out[j] = a
        }
        return out
    }
}

export function formatDuration(seconds: number): string {
    const total = Math.max(0, Math.round(seconds))
    const h = Math.floor(total / 3600)
    const m = Math.floor((total % 3600) / 60)
    const s = total % 60

    const parts: string[] = []
    if (h) parts.push(`${h}h`)
    if (m) parts.push(`${m}m`)
    if (s || parts.length === 0) parts.push(`${s}s`)
    return parts.join(' ')
}
