import fs from 'fs'
import path from 'path'
import { describe, expect, it } from 'vitest'

import { formatEntry, formatFields, formatTimestamp, Logger, LogEntry, TraceFileSink } from '../../src/util/Logger'
import { MemorySink, tmpDir } from '../helpers'

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
    return {
        timestamp: new Date(2026, 0, 2, 3, 4, 5),
        level: 'log',
        session: 's1',
        title: 'TASKS',
        message: 'Done',
        ...overrides
    }
}

describe('formatting', () => {
    it('formats local timestamps', () => {
        expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04:05')
    })

    it('renders fields as key=value and skips undefined values', () => {
        expect(formatFields({ task: 7, ok: true, skipped: undefined, none: null })).toBe('task=7 ok=true none=null')
        expect(formatFields()).toBe('')
    })

    it('renders a plain line when colours are off', () => {
        const line = formatEntry(entry({ fields: { task: 7 } }), false)
        expect(line).toBe(`[2026-01-02 03:04:05] [${process.pid}] ✓ [s1] [TASKS] Done task=7`)
    })

    it('uses a level indicator per level', () => {
        expect(formatEntry(entry({ level: 'warn', message: 'Careful' }), false))
            .toBe(`[2026-01-02 03:04:05] [${process.pid}] ⚠ [s1] [TASKS] Careful`)
        expect(formatEntry(entry({ level: 'error', message: 'Broken' }), false))
            .toBe(`[2026-01-02 03:04:05] [${process.pid}] ✗ [s1] [TASKS] Broken`)
    })
})

describe('Logger', () => {
    it('suppresses debug entries unless enabled', () => {
        const sink = new MemorySink()
        new Logger('s1', [sink]).debug('TASKS', 'hidden')
        new Logger('s1', [sink], { debug: true }).debug('TASKS', 'shown')
        expect(sink.messages()).toEqual(['shown'])
    })

    it('drops excluded titles regardless of case', () => {
        const sink = new MemorySink()
        const log = new Logger('s1', [sink], { excludeFunc: ['ads'] })
        log.log('ADS', 'hidden')
        log.log('CLAN', 'shown')
        expect(sink.messages()).toEqual(['shown'])
    })

    it('returns an error carrying session and title', () => {
        const sink = new MemorySink()
        const err = new Logger('s1', [sink]).error('AUTH', 'failed', { status: 401 })
        expect(err.message).toBe('[s1] [AUTH] failed')
        expect(sink.entries[0]).toMatchObject({ level: 'error', title: 'AUTH', fields: { status: 401 } })
    })

    it('keeps sinks and options in child loggers', () => {
        const sink = new MemorySink()
        new Logger('main', [sink]).child('s2').success('CLAN', 'joined')
        expect(sink.entries[0]).toMatchObject({ session: 's2', level: 'success', message: 'joined' })
    })
})

describe('TraceFileSink', () => {
    it('appends error entries with their stack to a dated file', () => {
        const dir = tmpDir()
        const sink = new TraceFileSink(dir)
        sink.write(entry({ level: 'error', title: 'AUTH', message: 'failed', fields: { status: 401 }, error: new Error('boom') }))

        const file = sink.fileFor(new Date(2026, 0, 2))
        expect(path.basename(file)).toBe('err_tracebacks_2026-01-02.txt')
        const content = fs.readFileSync(file, 'utf-8')
        expect(content.startsWith('2026-01-02 03:04:05 | TRACE | s1 | AUTH | failed status=401\nError: boom')).toBe(true)
    })

    it('ignores non-error entries', () => {
        const dir = tmpDir()
        const sink = new TraceFileSink(dir)
        sink.write(entry({ level: 'warn' }))
        expect(fs.existsSync(sink.fileFor(new Date(2026, 0, 2)))).toBe(false)
    })
})
