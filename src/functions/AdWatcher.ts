import axios from 'axios'

import type { AdDescriptor } from '../interface/Api'
import type { Range } from '../interface/Config'
import { ADS, URLS } from '../constants'
import { isAbortError, shortErr } from '../util/Errors'
import { Workers } from './Workers'

export type AdWatchState = 'requesting' | 'rendered' | 'shown' | 'rewarded' | 'failed'

export type TrackingEvent = 'render' | 'show' | 'reward'

export interface AdView {
    render: string
    show: string
    reward: string
    title: string
    bannerType: string
}

export type AdWatchResult =
    | { state: 'rewarded', ad: AdView }
    | { state: 'failed', failedAt: Exclude<AdWatchState, 'failed' | 'rewarded'>, reason: string, status?: number, unauthorized: boolean }

interface Transition {
    from: 'requesting' | 'rendered' | 'shown'
    to: 'rendered' | 'shown' | 'rewarded'
    event: TrackingEvent
    // Dwell periods (seconds) after the tracking ping, in order
    dwell: Range[]
}

const TRANSITIONS: readonly Transition[] = [
    { from: 'requesting', to: 'rendered', event: 'render', dwell: [ADS.DWELL.RENDER] },
    { from: 'rendered', to: 'shown', event: 'show', dwell: [ADS.DWELL.SHOW, ADS.DWELL.VIEWING] },
    { from: 'shown', to: 'rewarded', event: 'reward', dwell: [] }
]

/**
 * Parses an ad descriptor into an AdView; undefined when any tracking URL is missing.
 */
export function parseAdDescriptor(descriptor: AdDescriptor | null | undefined): AdView | undefined {
    const banner = descriptor?.banner
    const trackings = new Map((banner?.trackings ?? []).map((t): [string, string] => [t.name, t.value]))
    const render = trackings.get('render')
    const show = trackings.get('show')
    const reward = trackings.get('reward')
    if (!render || !show || !reward) return undefined

    const title = banner?.bannerAssets?.find(a => a.name === 'title')?.value ?? 'Unknown'
    return { render, show, reward, title, bannerType: descriptor?.bannerType ?? 'Unknown' }
}

/**
 * One rewarded-video viewing cycle: Requesting -> Rendered -> Shown -> Rewarded, or Failed.
 * Re-authentication after a 401 is left to the session loop.
 */
export class AdWatcher extends Workers {
    private current: AdWatchState = 'requesting'

    get phase(): AdWatchState {
        return this.current
    }

    adParams(telegramId: number): URLSearchParams {
        return new URLSearchParams({
            blockId: ADS.BLOCK_ID,
            tg_id: String(telegramId),
            tg_platform: 'android',
            platform: 'MacIntel',
            language: 'ru',
            top_domain: new URL(URLS.ORIGIN).hostname,
            connectiontype: '1',
            request_id: String(this.utils.now())
        })
    }

    async watch(): Promise<AdWatchResult> {
        this.current = 'requesting'

        const telegramId = this.state.telegramId
        if (!telegramId) {
            return this.fail('requesting', 'No user id for the ad request')
        }

        let ad: AdView | undefined
        try {
            const res = await this.state.http.request<AdDescriptor>({
                method: 'GET',
                url: `${this.config.adsURL}/adv?${this.adParams(telegramId).toString()}`
            })
            if (res.status < 200 || res.status >= 300) {
                return this.fail('requesting', 'Failed to get ad', res.status)
            }
            ad = parseAdDescriptor(res.data)
        } catch (error) {
            return this.failOnError('requesting', error)
        }

        if (!ad) {
            return this.fail('requesting', 'No tracking data in ad response')
        }
        this.log.log('ADS', 'Starting to watch ad', { title: ad.title, type: ad.bannerType })

        for (const transition of TRANSITIONS) {
            try {
                const res = await this.state.http.request({ method: 'GET', url: ad[transition.event] })
                if (res.status < 200 || res.status >= 300) {
                    return this.fail(transition.from, `Tracking ${transition.event} rejected`, res.status)
                }
            } catch (error) {
                return this.failOnError(transition.from, error)
            }

            this.current = transition.to
            this.log.debug('ADS', `Ad ${transition.to}`, { event: transition.event })
            for (const dwell of transition.dwell) {
                await this.pause(dwell)
            }
        }

        this.log.success('ADS', 'Advertisement view completed')
        return { state: 'rewarded', ad }
    }

    private failOnError(at: Transition['from'], error: unknown): AdWatchResult {
        if (isAbortError(error)) throw error
        const status = axios.isAxiosError(error) ? error.response?.status : undefined
        return this.fail(at, shortErr(error), status)
    }

    private fail(at: Transition['from'], reason: string, status?: number): AdWatchResult {
        this.current = 'failed'
        const unauthorized = status === 401

        if (unauthorized) {
            this.log.warn('ADS', 'Unauthorized while watching ad, credentials need renewal', { at })
        } else if (status !== undefined && status >= 400 && status < 500) {
            this.log.error('ADS', 'Client error while watching ad', { at, status, reason })
        } else if (status !== undefined) {
            this.log.error('ADS', 'Server error while watching ad', { at, status, reason })
        } else {
            this.log.error('ADS', 'Error while watching ad', { at, reason })
        }
        return { state: 'failed', failedAt: at, reason, status, unauthorized }
    }
}
