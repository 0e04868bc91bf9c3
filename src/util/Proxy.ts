import type { AxiosClientFactory } from './Axios'
import type { ProxyProvider } from '../interface/Collaborators'
import type { ConfigProxy } from '../interface/Config'
import { isAbortError } from './Errors'
import type Util from './Utils'

/**
 * Shared by every session in the process. Tracks how many sessions hold each proxy
 * so a replacement never exceeds `sessionsPerProxy`.
 */
export class ProxyPool implements ProxyProvider {
    private readonly proxies: string[]
    private readonly config: ConfigProxy
    private readonly factory: AxiosClientFactory
    private readonly utils: Util
    private readonly holders = new Map<string, number>()

    constructor(proxies: string[], config: ConfigProxy, factory: AxiosClientFactory, utils: Util) {
        this.proxies = [...new Set(proxies)]
        this.config = config
        this.factory = factory
        this.utils = utils
    }

    get size(): number {
        return this.proxies.length
    }

    holdersOf(proxy: string): number {
        return this.holders.get(proxy) ?? 0
    }

    claim(proxy: string): void {
        this.holders.set(proxy, this.holdersOf(proxy) + 1)
    }

    release(proxy: string): void {
        const count = this.holdersOf(proxy) - 1
        if (count > 0) this.holders.set(proxy, count)
        else this.holders.delete(proxy)
    }

    // Liveness probe: a 2xx from the check URL through the proxy
    async isAlive(proxy: string): Promise<boolean> {
        const client = this.factory(proxy)
        try {
            const res = await client.request({ url: this.config.checkURL, method: 'GET', timeout: this.config.checkTimeout })
            return res.status >= 200 && res.status < 300
        } catch (error) {
            if (isAbortError(error)) throw error
            return false
        } finally {
            client.close()
        }
    }

    /**
     * First live proxy with a free slot. The slot is reserved before the probe so
     * concurrent failovers cannot overfill a proxy. The current proxy is never re-picked
     * and is only released once a replacement holds its slot.
     */
    async findReplacement(current?: string): Promise<string | undefined> {
        const candidates = this.utils.shuffleArray(this.proxies).filter(p => p !== current)

        for (const proxy of candidates) {
            if (this.holdersOf(proxy) >= this.config.sessionsPerProxy) continue

            this.claim(proxy)
            let alive = false
            try {
                alive = await this.isAlive(proxy)
            } finally {
                if (!alive) this.release(proxy)
            }

            if (alive) {
                if (current) this.release(current)
                return proxy
            }
        }
        return undefined
    }
}

// Hides credentials before a proxy URL reaches the logs
export function redactProxy(proxy: string): string {
    return proxy.replace(/\/\/([^:@/]+):([^@/]*)@/, '//$1:***@')
}
