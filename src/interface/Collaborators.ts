import type { Task } from './Task'

/** Produces the signed web-session blob exchanged for a bearer token. */
export interface TokenSource {
    getInitData(): Promise<string>
}

/** Joins the channel a subscription task points at. */
export interface ChannelJoiner {
    joinChannel(task: Task): Promise<boolean>
}

export interface ProxyProvider {
    isAlive(proxy: string): Promise<boolean>
    findReplacement(current?: string): Promise<string | undefined>
}
