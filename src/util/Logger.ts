import chalk from 'chalk'
import fs from 'fs'
import path from 'path'

export type LogLevel = 'debug' | 'log' | 'success' | 'warn' | 'error'

export type LogFields = Record<string, string | number | boolean | null | undefined>

export interface LogEntry {
    timestamp: Date
    level: LogLevel
    session: string
    title: string
    message: string
    fields?: LogFields
    error?: unknown
}

export interface LogSink {
    write(entry: LogEntry): void
}

export interface LoggerOptions {
    debug?: boolean
    excludeFunc?: string[]
}

export class Logger {
    private readonly session: string
    private readonly sinks: LogSink[]
    private readonly options: LoggerOptions

    constructor(session: string, sinks: LogSink[], options: LoggerOptions = {}) {
        this.session = session
        this.sinks = sinks
        this.options = options
    }

    child(session: string): Logger {
        return new Logger(session, this.sinks, this.options)
    }

    debug(title: string, message: string, fields?: LogFields): void {
        if (!this.options.debug) return
        this.emit('debug', title, message, fields)
    }

    log(title: string, message: string, fields?: LogFields): void {
        this.emit('log', title, message, fields)
    }

    success(title: string, message: string, fields?: LogFields): void {
        this.emit('success', title, message, fields)
    }

    warn(title: string, message: string, fields?: LogFields): void {
        this.emit('warn', title, message, fields)
    }

    /**
     * Returns an Error carrying the message so callers can `throw log.error(...)`.
     */
    error(title: string, message: string, fields?: LogFields, error?: unknown): Error {
        this.emit('error', title, message, fields, error)
        return new Error(`[${this.session}] [${title}] ${message}`)
    }

    private emit(level: LogLevel, title: string, message: string, fields?: LogFields, error?: unknown): void {
        const excluded = this.options.excludeFunc ?? []
        if (excluded.some(x => x.toLowerCase() === title.toLowerCase())) return

        const entry: LogEntry = { timestamp: new Date(), level, session: this.session, title, message, fields, error }
        for (const sink of this.sinks) {
            try {
                sink.write(entry)
            } catch (err) {
                console.error('[Logger] sink failed:', err)
            }
        }
    }
}

function pad(n: number): string {
    return String(n).padStart(2, '0')
}

export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function formatFields(fields?: LogFields): string {
    if (!fields) return ''
    return Object.entries(fields)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${value}`)
        .join(' ')
}

const INDICATORS: Record<LogLevel, string> = {
    debug: '·',
    log: '✓',
    success: '✓',
    warn: '⚠',
    error: '✗'
}

/**
 * Console rendering: `[time] [pid] <indicator> [session] [TITLE] message key=value`
 */
export function formatEntry(entry: LogEntry, colors: boolean): string {
    const c = new chalk.Instance({ level: colors ? 1 : 0 })
    const levelColor = entry.level === 'error' ? c.red
        : entry.level === 'warn' ? c.yellow
            : entry.level === 'success' ? c.green
                : entry.level === 'debug' ? c.gray
                    : c.cyan

    const message = entry.level === 'success' ? c.green(entry.message)
        : entry.level === 'error' ? c.red(entry.message)
            : entry.level === 'warn' ? c.yellow(entry.message)
                : entry.message
    const fields = formatFields(entry.fields)

    return [
        c.gray(`[${formatTimestamp(entry.timestamp)}]`),
        c.gray(`[${process.pid}]`),
        levelColor(INDICATORS[entry.level]),
        c.magenta(`[${entry.session}]`),
        c.bold(`[${entry.title}]`),
        fields ? `${message} ${c.dim(fields)}` : message
    ].join(' ')
}

export class ConsoleSink implements LogSink {
    private readonly colors: boolean

    constructor(colors = true) {
        this.colors = colors
    }

    write(entry: LogEntry): void {
        const line = formatEntry(entry, this.colors)
        switch (entry.level) {
            case 'warn':
                console.warn(line)
                break
            case 'error':
                console.error(line)
                break
            default:
                console.log(line)
                break
        }
    }
}

/**
 * Debug-only sink: appends error entries (with stack) to a dated trace file.
 */
export class TraceFileSink implements LogSink {
    private readonly dir: string

    constructor(dir: string) {
        this.dir = dir
    }

    fileFor(date: Date): string {
        return path.join(this.dir, `err_tracebacks_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}.txt`)
    }

    write(entry: LogEntry): void {
        if (entry.level !== 'error') return

        const stack = entry.error instanceof Error ? entry.error.stack ?? entry.error.message
            : entry.error !== undefined ? String(entry.error)
                : ''
        const fields = formatFields(entry.fields)
        const line = `${formatTimestamp(entry.timestamp)} | TRACE | ${entry.session} | ${entry.title} | ${entry.message}` +
            `${fields ? ` ${fields}` : ''}${stack ? `\n${stack}` : ''}\n`

        fs.mkdirSync(this.dir, { recursive: true })
        fs.appendFileSync(this.fileFor(entry.timestamp), line)
    }
}
