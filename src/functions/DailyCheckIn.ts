import { isOk } from '../client/BitApi'
import { Workers } from './Workers'

export class DailyCheckIn extends Workers {
    /** `next_available_at: null` means the check-in can be claimed now. */
    async isAvailable(): Promise<boolean> {
        const res = await this.api.getCheckInAvailability()
        if (!isOk(res.status)) {
            this.log.error('DAILY-CHECK-IN', 'Failed to check daily check-in', { status: res.status })
            return false
        }
        return res.data?.next_available_at == null
    }

    async perform(): Promise<boolean> {
        const res = await this.api.performCheckIn()
        if (isOk(res.status, [200, 204])) {
            this.log.success('DAILY-CHECK-IN', 'Daily check-in completed')
            return true
        }
        this.log.error('DAILY-CHECK-IN', 'Failed to perform daily check-in', { status: res.status })
        return false
    }

    async run(): Promise<boolean> {
        if (!await this.isAvailable()) return false
        return this.perform()
    }
}
