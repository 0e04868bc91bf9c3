import { isOk } from '../client/BitApi'
import type { TokenSource } from '../interface/Collaborators'
import type { SessionContext } from '../interface/Session'
import { AuthFailure, isAbortError, shortErr } from '../util/Errors'
import { userIdFromInitData } from '../util/InitData'
import { DailyCheckIn } from './DailyCheckIn'
import { Workers } from './Workers'

/**
 * Owns the bearer token and its validity window.
 */
export class CredentialManager extends Workers {
    private readonly source: TokenSource
    private readonly checkIn: DailyCheckIn

    constructor(ctx: SessionContext, source: TokenSource, checkIn: DailyCheckIn) {
        super(ctx)
        this.source = source
        this.checkIn = checkIn
    }

    isExpired(maxAgeSeconds: number): boolean {
        if (!this.state.accessToken) return true
        return this.utils.now() - this.state.tokenIssuedAt >= maxAgeSeconds * 1000
    }

    /**
     * Re-authenticates when the token is missing or older than `maxAgeSeconds`.
     * Resolves `true` when a new token was issued. Throws AuthFailure (session-fatal).
     */
    async ensureFresh(maxAgeSeconds = this.config.tokenLifetime): Promise<boolean> {
        if (!this.isExpired(maxAgeSeconds)) return false

        let initData: string
        try {
            initData = (await this.source.getInitData()).trim()
        } catch (error) {
            if (isAbortError(error)) throw error
            throw new AuthFailure(`Token source failed: ${shortErr(error)}`, { cause: error })
        }
        if (!initData) {
            throw new AuthFailure('Token source returned no web-session data')
        }

        const res = await this.api.authenticate(initData)
        const token = res.data?.access_token
        if (!isOk(res.status) || typeof token !== 'string' || !token) {
            throw new AuthFailure(`Auth failed with status ${res.status}`)
        }

        this.state.initData = initData
        this.state.accessToken = token
        this.state.tokenIssuedAt = this.utils.now()
        this.state.telegramId ??= userIdFromInitData(initData)
        this.log.success('AUTH', 'Access token issued')

        await this.checkIn.run()
        return true
    }
}
