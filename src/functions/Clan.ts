import { isOk } from '../client/BitApi'
import { Workers } from './Workers'

export type ClanOutcome = 'joined' | 'rejoined' | 'unchanged' | 'not-found' | 'failed' | 'skipped'

export class ClanManager extends Workers {
    async search(): Promise<number | undefined> {
        const name = this.config.clanName
        const res = await this.api.searchClans(name)
        if (!isOk(res.status) || !Array.isArray(res.data)) {
            this.log.error('CLAN', 'Failed to search clan', { status: res.status })
            return undefined
        }

        const clan = res.data.find(c => c.name === name)
        if (!clan) {
            this.log.warn('CLAN', 'Clan not found', { clan: name })
            return undefined
        }
        this.log.log('CLAN', 'Found clan', { clan: name, id: clan.id })
        return clan.id
    }

    async join(clanId: number): Promise<boolean> {
        const res = await this.api.joinClan(clanId)
        if (!isOk(res.status, [200, 204])) {
            this.log.error('CLAN', 'Failed to join clan', { status: res.status })
            return false
        }
        this.state.clanId = clanId
        this.log.success('CLAN', 'Joined clan', { clan: this.config.clanName })
        return true
    }

    async leave(): Promise<boolean> {
        const res = await this.api.leaveClan()
        if (!isOk(res.status, [200, 204])) {
            this.log.error('CLAN', 'Failed to leave clan', { status: res.status })
            return false
        }
        this.state.clanId = undefined
        this.log.log('CLAN', 'Left current clan')
        return true
    }

    async getName(clanId: number): Promise<string | undefined> {
        const res = await this.api.getClan(clanId)
        if (!isOk(res.status)) {
            this.log.error('CLAN', 'Failed to get clan info', { status: res.status })
            return undefined
        }
        return typeof res.data?.name === 'string' ? res.data.name : undefined
    }

    private async searchAndJoin(): Promise<boolean | undefined> {
        const clanId = await this.search()
        if (clanId === undefined) return undefined
        return this.join(clanId)
    }

    /**
     * Brings membership in line with `clanName`: join when clanless, leave and rejoin
     * when in another clan, nothing when already in the right one.
     */
    async ensureMembership(): Promise<ClanOutcome> {
        if (!this.config.clanName) return 'skipped'

        if (!this.state.clanId) {
            const joined = await this.searchAndJoin()
            return joined === undefined ? 'not-found' : joined ? 'joined' : 'failed'
        }

        const current = await this.getName(this.state.clanId)
        if (current === undefined) return 'failed'

        if (current === this.config.clanName) {
            this.log.log('CLAN', 'Already in the configured clan', { clan: current })
            return 'unchanged'
        }

        this.log.log('CLAN', 'In the wrong clan, switching', { current, wanted: this.config.clanName })
        if (!await this.leave()) return 'failed'
        const joined = await this.searchAndJoin()
        return joined === undefined ? 'not-found' : joined ? 'rejoined' : 'failed'
    }
}
