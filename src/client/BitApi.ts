import type { AxiosRequestConfig, AxiosResponse, Method, RawAxiosRequestHeaders } from 'axios'

import type { Config } from '../interface/Config'
import type { SessionState } from '../interface/Session'
import type { Task } from '../interface/Task'
import type {
    AuthTokenResponse, CheckInAvailability, Clan, DurovJumpPayload, DurovJumpResult,
    Profile, ReferralsPage, SpeedtestResult, SpeedtestState, VoucherResponse
} from '../interface/Api'
import { DEFAULT_HEADERS, PAGE, URLS } from '../constants'
import { InvalidSession } from '../util/Errors'

interface CallOptions {
    auth?: boolean
    params?: Record<string, string | number>
    data?: unknown
    headers?: RawAxiosRequestHeaders
}

export function isOk(status: number, accepted: readonly number[] = [200]): boolean {
    return accepted.includes(status)
}

/**
 * Thin wrapper over the backend endpoints. Returns raw responses: status handling is
 * the caller's decision (soft fallback vs. session-fatal).
 */
export class BitApi {
    private readonly config: Config
    private readonly state: SessionState

    constructor(config: Config, state: SessionState) {
        this.config = config
        this.state = state
    }

    private url(pathname: string): string {
        return `${this.config.baseURL}${pathname}`
    }

    private headers(extra?: RawAxiosRequestHeaders, auth = true): RawAxiosRequestHeaders {
        const headers: RawAxiosRequestHeaders = {
            ...DEFAULT_HEADERS,
            'User-Agent': this.state.account.userAgent
        }
        if (auth) headers['Authorization'] = `Bearer ${this.state.accessToken}`
        return { ...headers, ...extra }
    }

    // Device headers the check-in and mini-game endpoints expect
    deviceHeaders(): RawAxiosRequestHeaders {
        return {
            'X-Device-Platform': this.state.account.devicePlatform ?? 'ios',
            'X-Device-Model': this.state.account.userAgent
        }
    }

    private async call<T>(method: Method, pathname: string, options: CallOptions = {}): Promise<AxiosResponse<T>> {
        const auth = options.auth ?? true
        if (this.state.http.isClosed || (auth && !this.state.accessToken)) {
            throw new InvalidSession('No access token or HTTP client not initialized')
        }

        const request: AxiosRequestConfig = {
            method,
            url: this.url(pathname),
            headers: this.headers(options.headers, auth),
            params: options.params,
            data: options.data
        }
        return this.state.http.request<T>(request)
    }

    authenticate(initData: string) {
        return this.call<AuthTokenResponse>('POST', '/auth/token', { auth: false, data: { init_data: initData } })
    }

    getMe() {
        return this.call<Profile>('GET', '/users/me')
    }

    searchClans(query: string) {
        return this.call<Clan[]>('GET', '/clans', { params: { ...PAGE, query } })
    }

    getClan(clanId: number) {
        return this.call<Clan>('GET', `/clans/${clanId}`)
    }

    joinClan(clanId: number) {
        return this.call<unknown>('POST', `/clans/${clanId}/join`)
    }

    leaveClan() {
        return this.call<unknown>('DELETE', '/clans/leave')
    }

    getSpeedtest() {
        return this.call<SpeedtestState>('GET', '/speedtest')
    }

    submitSpeedtest(download: number, upload: number) {
        return this.call<SpeedtestResult>('POST', '/speedtest', { data: { download, upload } })
    }

    getTasks() {
        return this.call<Task[]>('GET', '/tasks')
    }

    getTask(taskId: number) {
        return this.call<Task>('GET', `/tasks/${taskId}`)
    }

    processTask(taskId: number) {
        return this.call<unknown>('POST', `/tasks/${taskId}/process`)
    }

    getReferrals() {
        return this.call<ReferralsPage>('GET', '/users/me/referrals', { params: { ...PAGE } })
    }

    getCheckInAvailability() {
        return this.call<CheckInAvailability>('GET', '/users/me/check-ins/available', { headers: this.deviceHeaders() })
    }

    performCheckIn() {
        return this.call<unknown>('POST', '/users/me/check-ins', { headers: this.deviceHeaders() })
    }

    createVoucher(amount: number) {
        return this.call<VoucherResponse>('POST', '/users/me/vouchers', { data: { amount } })
    }

    submitDurovJump(payload: DurovJumpPayload) {
        return this.call<DurovJumpResult>('POST', '/durov-jump', {
            data: payload,
            headers: { ...this.deviceHeaders(), 'Referer': `${URLS.ORIGIN}/durov-jump` }
        })
    }
}
