import fs from 'fs'
import os from 'os'
import path from 'path'
import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios'

import { BitApi } from '../src/client/BitApi'
import type { Account } from '../src/interface/Account'
import type { Config } from '../src/interface/Config'
import { createSessionState, SessionContext } from '../src/interface/Session'
import AxiosClient from '../src/util/Axios'
import { AbortError } from '../src/util/Errors'
import { normalizeConfig } from '../src/util/Load'
import { LogEntry, Logger, LogLevel, LogSink } from '../src/util/Logger'
import Util from '../src/util/Utils'

export interface RecordedCall {
    method: string
    path: string
    url: string
    query: Record<string, string>
    data: unknown
    headers: Record<string, string>
}

export interface FakeReply {
    status: number
    data?: unknown
}

export type Reply = FakeReply | ((call: RecordedCall) => FakeReply)

function parseBody(data: unknown): unknown {
    if (typeof data !== 'string') return data
    try {
        return JSON.parse(data)
    } catch {
        return data
    }
}

/**
 * In-process stand-in for the backend, plugged in as the axios adapter. Routes are keyed
 * by method and URL path; queued replies are consumed in order and the last one sticks.
 */
export class FakeServer {
    readonly calls: RecordedCall[] = []
    private readonly routes = new Map<string, Reply[]>()

    on(method: string, pathname: string, ...replies: Reply[]): this {
        this.routes.set(`${method.toUpperCase()} ${pathname}`, replies)
        return this
    }

    count(method: string, pathname: string): number {
        return this.calls.filter(c => c.method === method.toUpperCase() && c.path === pathname).length
    }

    callsTo(method: string, pathname: string): RecordedCall[] {
        return this.calls.filter(c => c.method === method.toUpperCase() && c.path === pathname)
    }

    readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
        const url = new URL(config.url ?? '')
        const query: Record<string, string> = {}
        url.searchParams.forEach((value, key) => { query[key] = value })
        for (const [key, value] of Object.entries(config.params ?? {})) {
            query[key] = String(value)
        }

        const headers: Record<string, string> = {}
        for (const [key, value] of Object.entries(config.headers.toJSON())) {
            if (value !== undefined && value !== null) headers[key.toLowerCase()] = String(value)
        }

        const call: RecordedCall = {
            method: (config.method ?? 'get').toUpperCase(),
            path: url.pathname,
            url: url.toString(),
            query,
            data: parseBody(config.data),
            headers
        }
        this.calls.push(call)

        const replies = this.routes.get(`${call.method} ${call.path}`)
        const next = replies && replies.length > 1 ? replies.shift() : replies?.[0]
        const reply = next === undefined ? { status: 404, data: { detail: 'Not found' } }
            : typeof next === 'function' ? next(call)
                : next

        return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config }
    }
}

export const START = Date.UTC(2026, 0, 15, 12, 0, 0)

/**
 * Sleeps resolve at once and advance a fake clock; random picks take the lower bound.
 */
export class InstantUtil extends Util {
    clock = START
    readonly waits: number[] = []

    override now(): number {
        return this.clock
    }

    override wait(ms: number): Promise<void> {
        if (this.aborted) return Promise.reject(new AbortError())
        this.waits.push(ms)
        this.clock += Math.max(0, ms)
        return Promise.resolve()
    }

    override randomNumber(min: number, max: number): number {
        return Math.min(min, max)
    }

    override randomFloat(min: number, max: number): number {
        return Math.min(min, max)
    }

    override shuffleArray<T>(arr: T[]): T[] {
        return [...arr]
    }
}

export class MemorySink implements LogSink {
    readonly entries: LogEntry[] = []

    write(entry: LogEntry): void {
        this.entries.push(entry)
    }

    messages(level?: LogLevel): string[] {
        return this.entries.filter(e => !level || e.level === level).map(e => e.message)
    }
}

export function makeConfig(raw: Record<string, unknown> = {}): Config {
    return normalizeConfig({
        baseURL: 'https://api.test',
        adsURL: 'https://ads.test',
        proxy: { enabled: false },
        ...raw
    })
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
    return {
        name: 'test-session',
        userAgent: 'test-agent',
        initData: 'query_id=test&user=%7B%22id%22%3A42%7D&hash=test-hash',
        ...overrides
    }
}

export interface TestContext {
    ctx: SessionContext
    server: FakeServer
    sink: MemorySink
    utils: InstantUtil
}

export interface ContextOptions {
    config?: Config
    account?: Account
    server?: FakeServer
    utils?: InstantUtil
    // Start with a valid token and user id; most components assume an authenticated session
    authenticated?: boolean
}

export function makeClient(server: FakeServer, proxy?: string): AxiosClient {
    return new AxiosClient({ proxy, adapter: server.adapter, maxAttempts: 1 })
}

export function makeContext(options: ContextOptions = {}): TestContext {
    const server = options.server ?? new FakeServer()
    const utils = options.utils ?? new InstantUtil()
    const config = options.config ?? makeConfig()
    const sink = new MemorySink()

    const state = createSessionState(options.account ?? makeAccount(), makeClient(server))
    if (options.authenticated ?? true) {
        state.accessToken = 'test-token'
        state.tokenIssuedAt = utils.now()
        state.telegramId = 42
    }

    const log = new Logger('test-session', [sink], { debug: true })
    const ctx: SessionContext = { config, state, api: new BitApi(config, state), log, utils }
    return { ctx, server, sink, utils }
}

export function tmpDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'bitapp-test-'))
}
