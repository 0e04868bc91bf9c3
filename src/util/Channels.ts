import type { Account } from '../interface/Account'
import type { ChannelJoiner } from '../interface/Collaborators'
import type { Task } from '../interface/Task'

// "https://t.me/foo", "t.me/foo?start=1", "@foo" and "foo" all become "foo"
export function normalizeChannel(value: string): string {
    return value.trim()
        .replace(/^https?:\/\//i, '')
        .replace(/^(www\.)?(t|telegram)\.me\//i, '')
        .replace(/^@/, '')
        .split(/[/?#]/)[0]
        ?.toLowerCase() ?? ''
}

export function channelOf(task: Task): string | undefined {
    const data = task.additional_data
    const raw = data?.url ?? data?.link ?? data?.channel
    if (typeof raw !== 'string') return undefined
    const channel = normalizeChannel(raw)
    return channel || undefined
}

/**
 * Channels are joined from the messaging client by hand; a subscription task succeeds
 * once its channel is listed in the account's `joinedChannels`.
 */
export class ManifestChannelJoiner implements ChannelJoiner {
    private readonly joined: Set<string>

    constructor(account: Account) {
        this.joined = new Set((account.joinedChannels ?? []).map(normalizeChannel).filter(Boolean))
    }

    async joinChannel(task: Task): Promise<boolean> {
        const channel = channelOf(task)
        return channel !== undefined && this.joined.has(channel)
    }
}
