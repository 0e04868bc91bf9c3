import type { AxiosClientFactory } from '../util/Axios'
import type { ProxyProvider } from '../interface/Collaborators'
import { redactProxy } from '../util/Proxy'
import type { SessionContext } from '../interface/Session'
import { Workers } from './Workers'

export class ProxyGuardian extends Workers {
    private readonly provider: ProxyProvider
    private readonly createClient: AxiosClientFactory

    constructor(ctx: SessionContext, provider: ProxyProvider, createClient: AxiosClientFactory) {
        super(ctx)
        this.provider = provider
        this.createClient = createClient
    }

    /**
     * `true` when the session may proceed on its (possibly new) transport; `false` when
     * no working proxy exists, leaving the transport untouched.
     */
    async verifyOrReplace(): Promise<boolean> {
        if (!this.config.proxy.enabled) return true

        const current = this.state.proxy
        if (current && await this.provider.isAlive(current)) return true

        if (current) {
            this.log.warn('PROXY', 'Current proxy failed the liveness check', { proxy: redactProxy(current) })
        }
        if (this.config.proxy.disableReplace) return false

        const replacement = await this.provider.findReplacement(current)
        if (!replacement) return false

        this.state.http.close()
        this.state.http = this.createClient(replacement)
        this.state.proxy = replacement
        this.log.log('PROXY', 'Switched to new proxy', { proxy: redactProxy(replacement) })
        return true
    }
}
