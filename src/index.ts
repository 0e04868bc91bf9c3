import path from 'path'

import { BitApi } from './client/BitApi'
import { Session } from './functions/Session'
import type { Account } from './interface/Account'
import type { Config } from './interface/Config'
import { createSessionState } from './interface/Session'
import AxiosClient, { AxiosClientFactory } from './util/Axios'
import { ManifestChannelJoiner } from './util/Channels'
import { AccountInitDataSource } from './util/InitData'
import { getConfigPath, loadAccounts, loadConfig, loadProxies } from './util/Load'
import { ConsoleSink, Logger, LogSink, TraceFileSink } from './util/Logger'
import { ProxyPool } from './util/Proxy'
import Util from './util/Utils'
import { VoucherLedger } from './util/VoucherLedger'

// Main bot class: one Session per account, all in this process
export class BitAppBot {
    readonly config: Config
    readonly log: Logger
    private readonly controller = new AbortController()
    private readonly utils: Util
    private readonly pool: ProxyPool
    private readonly ledger: VoucherLedger
    private accounts: Account[] = []

    constructor(config: Config = loadConfig()) {
        this.config = config
        this.utils = new Util(this.controller.signal)

        const sinks: LogSink[] = [new ConsoleSink(config.logging.colors)]
        if (config.logging.debug) {
            sinks.push(new TraceFileSink(path.resolve(config.logging.traceDir)))
        }
        this.log = new Logger('main', sinks, { debug: config.logging.debug, excludeFunc: config.logging.excludeFunc })

        const proxies = config.proxy.enabled ? loadProxies(config.proxy.file) : []
        this.pool = new ProxyPool(proxies, config.proxy, this.clientFactory(), this.utils)

        // The ledger sits next to the config file unless an absolute path is given
        const base = getConfigPath() ? path.dirname(getConfigPath()) : process.cwd()
        this.ledger = new VoucherLedger(path.resolve(base, config.vouchers.storageFile))
    }

    get signal(): AbortSignal {
        return this.controller.signal
    }

    clientFactory(userAgent?: string): AxiosClientFactory {
        return (proxy?: string) => new AxiosClient({
            proxy,
            timeout: this.config.http.timeout,
            signal: this.controller.signal,
            headers: userAgent ? { 'User-Agent': userAgent } : undefined
        })
    }

    initialize(accounts: Account[] = loadAccounts(this.config)): void {
        this.accounts = accounts
        this.log.log('MAIN', 'Bot initialized', {
            accounts: accounts.length,
            proxies: this.pool.size,
            proxy: this.config.proxy.enabled ? 'on' : 'off'
        })
    }

    createSession(account: Account): Session {
        const createClient = this.clientFactory(account.userAgent)

        let proxy: string | undefined
        if (this.config.proxy.enabled && account.proxy) {
            proxy = account.proxy
            this.pool.claim(proxy)
        }

        const state = createSessionState(account, createClient(proxy))
        const log = this.log.child(account.name)
        return new Session(
            { config: this.config, state, api: new BitApi(this.config, state), log, utils: this.utils },
            {
                tokenSource: new AccountInitDataSource(account),
                channelJoiner: new ManifestChannelJoiner(account),
                proxyProvider: this.pool,
                createClient,
                ledger: this.ledger
            }
        )
    }

    async run(): Promise<void> {
        if (this.accounts.length === 0) {
            this.log.warn('MAIN', 'No enabled accounts found')
            return
        }
        await Promise.all(this.accounts.map(account => this.createSession(account).run()))
        this.log.log('MAIN', 'All sessions finished')
    }

    stop(): void {
        if (this.controller.signal.aborted) return
        this.log.warn('MAIN', 'Shutting down, stopping all sessions')
        this.controller.abort()
    }
}

async function main() {
    const bot = new BitAppBot()

    process.on('SIGINT', () => bot.stop())
    process.on('SIGTERM', () => bot.stop())
    process.on('unhandledRejection', (reason) => {
        bot.log.error('MAIN', 'Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) }, reason)
    })

    bot.initialize()
    await bot.run()
}

// Start the bot
if (require.main === module) {
    main().catch(error => {
        console.error(`[main] [MAIN-ERROR] Error running bot: ${error instanceof Error ? error.message : String(error)}`)
        process.exit(1)
    })
}
