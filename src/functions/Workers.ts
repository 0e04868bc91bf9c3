import type { BitApi } from '../client/BitApi'
import type { Config, Range } from '../interface/Config'
import type { SessionContext, SessionState } from '../interface/Session'
import type { Logger } from '../util/Logger'
import type Util from '../util/Utils'

export class Workers {
    protected readonly ctx: SessionContext

    constructor(ctx: SessionContext) {
        this.ctx = ctx
    }

    protected get api(): BitApi { return this.ctx.api }
    protected get log(): Logger { return this.ctx.log }
    protected get utils(): Util { return this.ctx.utils }
    protected get state(): SessionState { return this.ctx.state }
    protected get config(): Config { return this.ctx.config }

    // Random pause in seconds, humanized pacing between actions
    protected async pause(range: Range): Promise<number> {
        const seconds = this.utils.randomInRange(range)
        await this.utils.waitSeconds(seconds)
        return seconds
    }
}
