import fs from 'fs'
import path from 'path'

import type { VoucherRecord } from '../interface/Voucher'

// One write queue per resolved file, shared by every ledger instance in the process
const queues = new Map<string, Promise<void>>()

/**
 * Append-only JSON array of claimed vouchers. Appends are serialized per file; existing
 * entries are never rewritten.
 */
export class VoucherLedger {
    readonly file: string

    constructor(file: string) {
        this.file = path.resolve(file)
    }

    append(record: VoucherRecord): Promise<void> {
        const previous = queues.get(this.file) ?? Promise.resolve()
        const next = previous.catch(() => undefined).then(() => this.write(record))
        queues.set(this.file, next)
        return next
    }

    async read(): Promise<VoucherRecord[]> {
        if (!fs.existsSync(this.file)) return []
        const text = await fs.promises.readFile(this.file, 'utf-8')
        if (!text.trim()) return []
        const parsed: unknown = JSON.parse(text)
        if (!Array.isArray(parsed)) {
            throw new Error(`voucher ledger ${this.file} is not a JSON array`)
        }
        return parsed
    }

    private async write(record: VoucherRecord): Promise<void> {
        const entries = await this.read()
        entries.push(record)
        await fs.promises.mkdir(path.dirname(this.file), { recursive: true })
        const tmp = `${this.file}.tmp`
        await fs.promises.writeFile(tmp, JSON.stringify(entries, null, 4))
        await fs.promises.rename(tmp, this.file)
    }
}
