import { isOk } from '../client/BitApi'
import type { SessionContext } from '../interface/Session'
import type { VoucherRecord } from '../interface/Voucher'
import { InvalidSession, isAbortError, shortErr } from '../util/Errors'
import type { VoucherLedger } from '../util/VoucherLedger'
import { Workers } from './Workers'

export class VoucherProcessor extends Workers {
    private readonly ledger: VoucherLedger

    constructor(ctx: SessionContext, ledger: VoucherLedger) {
        super(ctx)
        this.ledger = ledger
    }

    async balance(): Promise<number> {
        const res = await this.api.getMe()
        if (!isOk(res.status)) {
            this.log.error('VOUCHERS', 'Failed to get balance', { status: res.status })
            return 0
        }
        const balance = Number(res.data?.balance ?? 0)
        this.log.log('VOUCHERS', 'Current balance', { balance })
        return Number.isFinite(balance) ? balance : 0
    }

    /**
     * Turns a share of the balance into a voucher and records it in the ledger.
     * Failures are logged; only cancellation and session-fatal errors escape.
     */
    async run(): Promise<VoucherRecord | undefined> {
        const settings = this.config.vouchers
        if (!settings.enabled) return undefined

        try {
            const balance = await this.balance()
            if (balance < settings.minBalance) {
                this.log.log('VOUCHERS', 'Not enough balance for voucher', { balance, required: settings.minBalance })
                return undefined
            }

            const amount = Math.floor(balance * settings.percent / 100)
            if (amount <= 0) {
                this.log.warn('VOUCHERS', 'Calculated voucher amount is too small', { amount })
                return undefined
            }

            await this.pause(this.config.actionDelay)
            const res = await this.api.createVoucher(amount)
            if (!isOk(res.status, [200, 201])) {
                this.log.error('VOUCHERS', 'Failed to create voucher', { status: res.status })
                return undefined
            }
            this.log.success('VOUCHERS', 'Created voucher', { amount })

            const record: VoucherRecord = {
                voucher_id: res.data?.voucher_id ?? null,
                link: res.data?.link ?? null,
                inline_query: res.data?.inline_query ?? null,
                amount,
                created_at: new Date(this.utils.now()).toISOString(),
                created_by: this.state.account.name,
                target_session: settings.targetSession || null
            }
            await this.ledger.append(record)
            this.log.success('VOUCHERS', 'Voucher saved', { amount, file: settings.storageFile })

            if (settings.targetSession) {
                this.log.log('VOUCHERS', 'Voucher ready for transfer', { target: settings.targetSession })
            }
            return record
        } catch (error) {
            if (isAbortError(error) || error instanceof InvalidSession) throw error
            this.log.error('VOUCHERS', 'Error processing vouchers', { reason: shortErr(error) }, error)
            return undefined
        }
    }
}
