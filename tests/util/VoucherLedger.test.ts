import fs from 'fs'
import path from 'path'
import { describe, expect, it } from 'vitest'

import type { VoucherRecord } from '../../src/interface/Voucher'
import { VoucherLedger } from '../../src/util/VoucherLedger'
import { tmpDir } from '../helpers'

function record(id: string, amount: number): VoucherRecord {
    return {
        voucher_id: id,
        link: `https://t.me/test_bot?start=${id}`,
        inline_query: null,
        amount,
        created_at: '2026-01-15T12:00:00.000Z',
        created_by: 'test-session',
        target_session: null
    }
}

describe('VoucherLedger', () => {
    it('reads an empty ledger when the file is missing', async () => {
        expect(await new VoucherLedger(path.join(tmpDir(), 'vouchers.json')).read()).toEqual([])
    })

    it('serializes concurrent appends to the same file', async () => {
        const file = path.join(tmpDir(), 'vouchers.json')
        const a = new VoucherLedger(file)
        const b = new VoucherLedger(file)

        await Promise.all([a.append(record('v1', 10)), b.append(record('v2', 20)), a.append(record('v3', 30))])

        const entries = await a.read()
        expect(entries.map(e => e.voucher_id)).toEqual(['v1', 'v2', 'v3'])
        expect(fs.readFileSync(file, 'utf-8')).toContain('\n    {\n        "voucher_id": "v1"')
    })

    it('never rewrites existing entries', async () => {
        const file = path.join(tmpDir(), 'vouchers.json')
        fs.writeFileSync(file, JSON.stringify([record('old', 5)]))
        await new VoucherLedger(file).append(record('new', 6))
        expect((await new VoucherLedger(file).read())).toEqual([record('old', 5), record('new', 6)])
    })

    it('refuses a file that is not a JSON array', async () => {
        const file = path.join(tmpDir(), 'vouchers.json')
        fs.writeFileSync(file, '{"voucher_id":"x"}')
        await expect(new VoucherLedger(file).read()).rejects.toThrow('is not a JSON array')
    })
})
