export interface VoucherRecord {
    voucher_id: string | null;
    link: string | null;
    inline_query: string | null;
    amount: number;
    created_at: string;
    created_by: string;
    target_session: string | null;
}
