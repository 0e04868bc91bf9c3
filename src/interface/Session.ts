import type { BitApi } from '../client/BitApi'
import type AxiosClient from '../util/Axios'
import type { Logger } from '../util/Logger'
import type Util from '../util/Utils'
import type { Config } from './Config'
import type { Account } from './Account'
import type { Task } from './Task'

/**
 * Mutable state of one account's session. Owned by a single control loop and only
 * touched by the components it calls, one at a time.
 */
export interface SessionState {
    readonly account: Account
    http: AxiosClient
    proxy?: string
    initData?: string
    accessToken?: string
    // ms since epoch, 0 when no token was ever issued
    tokenIssuedAt: number
    telegramId?: number
    clanId?: number
    nextAvailable?: Date
    tasks: Task[]
}

export function createSessionState(account: Account, http: AxiosClient): SessionState {
    return {
        account,
        http,
        proxy: http.proxy,
        tokenIssuedAt: 0,
        tasks: []
    }
}

/** What every session component receives at construction; no ambient globals. */
export interface SessionContext {
    readonly config: Config
    readonly state: SessionState
    readonly api: BitApi
    readonly log: Logger
    readonly utils: Util
}
