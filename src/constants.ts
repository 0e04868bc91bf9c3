import type { Range } from './interface/Config'
import type { TaskKind, TaskPolicy } from './interface/Task'

export const URLS = {
    BASE: 'https://bitappprod.com/api',
    ADS: 'https://api.adsgram.ai',
    ORIGIN: 'https://bitappprod.com'
} as const

export const TOKEN_LIFETIME_SECONDS = 7200

// Seconds unless noted
export const DELAYS = {
    PROXY_UNAVAILABLE: 300,
    TASK_PACING: { min: 2, max: 5 },
    PRE_SUBMIT: { min: 40, max: 60 },
    ERROR_BACKOFF: { min: 60, max: 120 },
    EXTRA_WAIT_JITTER: { min: 1, max: 30 },
    AD_VIEW_GAP: 3
} as const satisfies Record<string, Range | number>

export const ADS = {
    BLOCK_ID: '5681',
    DEFAULT_VIEWS: 10,
    DWELL: {
        RENDER: { min: 1, max: 2 },
        SHOW: { min: 5, max: 7 },
        VIEWING: { min: 15, max: 20 }
    }
} as const

export const PAGE = { limit: 20, offset: 0 } as const

export const DEFAULT_HEADERS = {
    'Accept': 'application/json',
    'Accept-Language': 'ru',
    'Content-Type': 'application/json',
    'Origin': URLS.ORIGIN,
    'Referer': `${URLS.ORIGIN}/`,
    'lang': 'en'
} as const

export const DEFAULT_TASK_POLICIES: Record<TaskKind, TaskPolicy> = {
    subscribe_telegram: { attempts: 10, delay: 5, enabled: false },
    social_network: { attempts: 3, delay: 2, enabled: true },
    join_clan: { attempts: 3, delay: 2, enabled: true },
    homescreen: { attempts: 4, delay: 3, enabled: true },
    story: { attempts: 4, delay: 3, enabled: true },
    activate_mining_bot: { attempts: 4, delay: 3, enabled: false },
    adsgram: { attempts: 4, delay: 3, enabled: false },
    referrals: { attempts: 1, delay: 1, enabled: true },
    promote_blockchain: { attempts: 1, delay: 1, enabled: false }
}

// Policy for kinds the server sends that this client does not know
export const FALLBACK_TASK_POLICY: TaskPolicy = { attempts: 4, delay: 3, enabled: false }
