import fs from 'fs'

import type { Account } from '../interface/Account'
import type { TokenSource } from '../interface/Collaborators'

/**
 * Accepts either the raw init data or a web-app URL (`...#tgWebAppData=...&tgWebAppVersion=...`).
 */
export function extractInitData(raw: string): string {
    const text = raw.trim()
    const marker = 'tgWebAppData='
    const start = text.indexOf(marker)
    if (start === -1) return text

    const rest = text.slice(start + marker.length)
    const end = rest.indexOf('&tgWebAppVersion')
    return decodeURIComponent(end === -1 ? rest : rest.slice(0, end))
}

/**
 * Reads the init data from the account manifest. A configured file is re-read on every
 * renewal so an external tool can keep it current.
 */
export class AccountInitDataSource implements TokenSource {
    private readonly account: Account

    constructor(account: Account) {
        this.account = account
    }

    async getInitData(): Promise<string> {
        if (this.account.initDataFile) {
            const content = await fs.promises.readFile(this.account.initDataFile, 'utf-8')
            return extractInitData(content)
        }
        return extractInitData(this.account.initData ?? '')
    }
}

/** Parses `user={...}` out of init data to read the numeric user id. */
export function userIdFromInitData(initData: string): number | undefined {
    const user = new URLSearchParams(initData).get('user')
    if (!user) return undefined
    const match = /"id"\s*:\s*(\d+)/.exec(user)
    return match?.[1] ? Number(match[1]) : undefined
}
