import fs from 'fs'
import path from 'path'

import { Account } from '../interface/Account'
import { Config, Range } from '../interface/Config'
import { TASK_KINDS, TaskKind, TaskPolicy } from '../interface/Task'
import { DEFAULT_TASK_POLICIES, TOKEN_LIFETIME_SECONDS, URLS } from '../constants'

let configCache: Config | undefined
let configSourcePath = ''

type RawObject = Record<string, unknown>

// Basic JSON comment stripper (supports // line and /* block */ comments while preserving strings)
export function stripJsonComments(input: string): string {
    let out = ''
    let inString = false
    let stringChar = ''
    let inLine = false
    let inBlock = false
    for (let i = 0; i < input.length; i++) {
        const ch = input[i] ?? ''
        const next = input[i + 1]
        if (inLine) {
            if (ch === '\n' || ch === '\r') {
                inLine = false
                out += ch
            }
            continue
        }
        if (inBlock) {
            if (ch === '*' && next === '/') {
                inBlock = false
                i++
            }
            continue
        }
        if (inString) {
            out += ch
            if (ch === '\\') { // escape next char
                i++
                if (i < input.length) out += input[i]
                continue
            }
            if (ch === stringChar) {
                inString = false
            }
            continue
        }
        if (ch === '"' || ch === '\'') {
            inString = true
            stringChar = ch
            out += ch
            continue
        }
        if (ch === '/' && next === '/') {
            inLine = true
            i++
            continue
        }
        if (ch === '/' && next === '*') {
            inBlock = true
            i++
            continue
        }
        out += ch
    }
    return out
}

function parseJsonc(text: string): unknown {
    return JSON.parse(stripJsonComments(text.replace(/^\uFEFF/, '')))
}

function isRecord(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(obj: RawObject, key: string): RawObject {
    const value = obj[key]
    return isRecord(value) ? value : {}
}

function bool(obj: RawObject, key: string, fallback: boolean): boolean {
    const value = obj[key]
    return typeof value === 'boolean' ? value : fallback
}

function num(obj: RawObject, key: string, fallback: number): number {
    const value = Number(obj[key])
    return obj[key] !== undefined && obj[key] !== null && Number.isFinite(value) ? value : fallback
}

function str(obj: RawObject, key: string, fallback: string): string {
    const value = obj[key]
    return typeof value === 'string' ? value : fallback
}

function strList(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value.filter((x): x is string => typeof x === 'string').map(x => x.trim()).filter(Boolean)
    }
    // Comma separated form: "session1, session2"
    if (typeof value === 'string') {
        return value.split(',').map(x => x.trim()).filter(Boolean)
    }
    return []
}

// Accepts { min, max } or [min, max]; swaps inverted bounds
function range(obj: RawObject, key: string, fallback: Range): Range {
    const value = obj[key]
    let min = fallback.min
    let max = fallback.max
    if (Array.isArray(value) && value.length === 2) {
        min = Number(value[0])
        max = Number(value[1])
    } else if (isRecord(value)) {
        min = num(value, 'min', fallback.min)
        max = num(value, 'max', fallback.max)
    }
    if (!Number.isFinite(min) || !Number.isFinite(max)) return { ...fallback }
    return min <= max ? { min, max } : { min: max, max: min }
}

function envFlag(name: string): boolean | undefined {
    const value = process.env[name]
    if (value === undefined || value.trim() === '') return undefined
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
}

/**
 * Every task kind ends up with exactly one policy. Configured values override the
 * defaults field by field; the subscription kind follows `tasks.subscribeTelegram`.
 */
export function resolveTaskPolicies(tasksSection: RawObject, subscribeTelegram: boolean): Record<TaskKind, TaskPolicy> {
    const overrides = section(tasksSection, 'policies')
    const out: Record<TaskKind, TaskPolicy> = { ...DEFAULT_TASK_POLICIES }
    for (const kind of TASK_KINDS) {
        const base = DEFAULT_TASK_POLICIES[kind]
        const raw = section(overrides, kind)
        out[kind] = {
            attempts: Math.max(1, Math.floor(num(raw, 'attempts', base.attempts))),
            delay: Math.max(0, num(raw, 'delay', base.delay)),
            enabled: bool(raw, 'enabled', base.enabled)
        }
    }
    out.subscribe_telegram.enabled = subscribeTelegram
    return out
}

// Normalize the raw config file into the Config interface, filling defaults
export function normalizeConfig(raw: unknown): Config {
    const n = isRecord(raw) ? raw : {}

    const speedtest = section(n, 'speedtest')
    const proxy = section(n, 'proxy')
    const http = section(n, 'http')
    const tasks = section(n, 'tasks')
    const vouchers = section(n, 'vouchers')
    const durovJump = section(n, 'durovJump')
    const logging = section(n, 'logging')

    const subscribeTelegram = bool(tasks, 'subscribeTelegram', false)

    const cfg: Config = {
        baseURL: str(n, 'baseURL', URLS.BASE).replace(/\/+$/, ''),
        adsURL: str(n, 'adsURL', URLS.ADS).replace(/\/+$/, ''),
        sessionStartDelay: Math.max(1, num(n, 'sessionStartDelay', 360)),
        tokenLifetime: Math.max(60, num(n, 'tokenLifetime', TOKEN_LIFETIME_SECONDS)),
        sessionWaitDelay: range(n, 'sessionWaitDelay', { min: 1, max: 80 }),
        actionDelay: range(n, 'actionDelay', { min: 2, max: 10 }),
        clanName: str(n, 'clanName', ''),
        speedtest: {
            download: range(speedtest, 'download', { min: 50, max: 250 }),
            upload: range(speedtest, 'upload', { min: 10, max: 50 })
        },
        proxy: {
            enabled: envFlag('USE_PROXY') ?? bool(proxy, 'enabled', true),
            disableReplace: bool(proxy, 'disableReplace', false),
            file: str(proxy, 'file', 'proxies.txt'),
            sessionsPerProxy: Math.max(1, Math.floor(num(proxy, 'sessionsPerProxy', 1))),
            checkURL: str(proxy, 'checkURL', 'https://api.ipify.org?format=json'),
            checkTimeout: num(proxy, 'checkTimeout', 10_000)
        },
        http: {
            timeout: num(http, 'timeout', 60_000)
        },
        tasks: {
            subscribeTelegram,
            policies: resolveTaskPolicies(tasks, subscribeTelegram)
        },
        vouchers: {
            enabled: bool(vouchers, 'enabled', false),
            minBalance: num(vouchers, 'minBalance', 10),
            percent: num(vouchers, 'percent', 10),
            targetSession: str(vouchers, 'targetSession', ''),
            storageFile: str(vouchers, 'storageFile', 'vouchers.json')
        },
        durovJump: {
            enabled: bool(durovJump, 'enabled', false),
            score: range(durovJump, 'score', { min: 300, max: 1556 }),
            duration: range(durovJump, 'duration', { min: 60, max: 180 })
        },
        logging: {
            debug: envFlag('DEBUG_LOGGING') ?? bool(logging, 'debug', false),
            colors: bool(logging, 'colors', true),
            excludeFunc: strList(logging.excludeFunc),
            traceDir: str(logging, 'traceDir', 'logs')
        },
        blacklistedSessions: strList(n.blacklistedSessions)
    }

    return cfg
}

function findFile(names: string[]): string | null {
    const bases = [
        path.join(__dirname, '../../'),    // repo root when compiled (dist/src/util)
        path.join(__dirname, '../'),       // src/ when running from sources
        process.cwd(),
        path.join(process.cwd(), 'src')
    ]
    for (const base of bases) {
        for (const name of names) {
            const p = path.join(base, name)
            if (fs.existsSync(p)) return p
        }
    }
    return null
}

export function getConfigPath(): string { return configSourcePath }

/**
 * Load and cache config.jsonc / config.json. An explicit path bypasses the cache.
 */
export function loadConfig(filePath?: string): Config {
    if (!filePath && configCache) return configCache

    const cfgPath = filePath ?? findFile(['config.jsonc', 'config.json'])
    if (!cfgPath) throw new Error('config.jsonc / config.json not found')

    const normalized = normalizeConfig(parseJsonc(fs.readFileSync(cfgPath, 'utf-8')))
    if (!filePath) {
        configCache = normalized
        configSourcePath = cfgPath
    }
    return normalized
}

function parseAccount(raw: unknown, index: number): Account {
    if (!isRecord(raw) || typeof raw.name !== 'string' || !raw.name.trim() || typeof raw.userAgent !== 'string') {
        throw new Error(`account #${index + 1} must have name and userAgent strings`)
    }
    return {
        enabled: typeof raw.enabled === 'boolean' ? raw.enabled : undefined,
        name: raw.name.trim(),
        userAgent: raw.userAgent,
        initData: typeof raw.initData === 'string' ? raw.initData : undefined,
        initDataFile: typeof raw.initDataFile === 'string' ? raw.initDataFile : undefined,
        devicePlatform: typeof raw.devicePlatform === 'string' ? raw.devicePlatform : undefined,
        proxy: typeof raw.proxy === 'string' && raw.proxy.trim() ? raw.proxy.trim() : undefined,
        joinedChannels: strList(raw.joinedChannels)
    }
}

/**
 * Load accounts supporting:
 * - ENV overrides: ACCOUNTS_JSON (raw JSON) or ACCOUNTS_FILE
 * - accounts.json / accounts.jsonc in the usual locations
 * - Either array or { accounts: [] } shape
 * - Filters out disabled and blacklisted sessions
 */
export function loadAccounts(config: Config, filePath?: string): Account[] {
    const envJson = process.env.ACCOUNTS_JSON
    const envFile = process.env.ACCOUNTS_FILE

    let raw: string
    if (filePath) {
        raw = fs.readFileSync(filePath, 'utf-8')
    } else if (envJson && envJson.trim().startsWith('[')) {
        raw = envJson
    } else if (envFile && envFile.trim()) {
        const full = path.isAbsolute(envFile) ? envFile : path.join(process.cwd(), envFile)
        if (!fs.existsSync(full)) throw new Error(`ACCOUNTS_FILE not found: ${full}`)
        raw = fs.readFileSync(full, 'utf-8')
    } else {
        const chosen = findFile(['accounts.json', 'accounts.jsonc'])
        if (!chosen) throw new Error('accounts.json / accounts.jsonc not found')
        raw = fs.readFileSync(chosen, 'utf-8')
    }

    const parsedUnknown = parseJsonc(raw)
    const parsed = Array.isArray(parsedUnknown) ? parsedUnknown
        : isRecord(parsedUnknown) && Array.isArray(parsedUnknown.accounts) ? parsedUnknown.accounts
            : null
    if (!parsed) throw new Error('accounts must be an array')

    const accounts = parsed.map((a: unknown, i: number) => parseAccount(a, i))
    const names = new Set<string>()
    for (const account of accounts) {
        if (names.has(account.name)) throw new Error(`duplicate account name: ${account.name}`)
        names.add(account.name)
    }

    const blacklist = new Set(config.blacklistedSessions)
    return accounts.filter(acc => acc.enabled !== false && !blacklist.has(acc.name))
}

/**
 * One proxy URL per line; blank lines and # comments are ignored. A missing file is an empty pool.
 */
export function loadProxies(filePath: string): string[] {
    const full = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath)
    if (!fs.existsSync(full)) return []
    return fs.readFileSync(full, 'utf-8')
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'))
}
