export interface AuthTokenResponse {
    access_token: string;
}

export interface Profile {
    telegram_id?: number;
    username?: string | null;
    clan_id?: number | null;
    balance?: number;
    tickets?: number;
}

export interface Clan {
    id: number;
    name: string;
}

export interface SpeedtestState {
    next_available?: string | null;
}

export interface SpeedtestResult {
    amount?: number;
}

export interface ReferralsPage {
    total?: number;
}

export interface CheckInAvailability {
    next_available_at?: string | null;
}

export interface VoucherResponse {
    voucher_id?: string;
    link?: string;
    inline_query?: string;
}

export interface DurovJumpPayload {
    score: number;
    start_at: string;
    end_at: string;
}

export interface DurovJumpResult {
    amount?: number;
}

export interface AdNameValue {
    name: string;
    value: string;
}

export interface AdDescriptor {
    bannerType?: string;
    banner?: {
        trackings?: AdNameValue[];
        bannerAssets?: AdNameValue[];
    };
}
