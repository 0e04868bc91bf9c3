export const TASK_KINDS = [
    'subscribe_telegram',
    'social_network',
    'join_clan',
    'homescreen',
    'story',
    'activate_mining_bot',
    'adsgram',
    'referrals',
    'promote_blockchain'
] as const

export type TaskKind = typeof TASK_KINDS[number]

export function isTaskKind(value: string): value is TaskKind {
    return (TASK_KINDS as readonly string[]).includes(value)
}

export interface TaskAdditionalData {
    referrals_count?: number;
    views?: number;
    url?: string;
    link?: string;
    channel?: string;
    [key: string]: unknown;
}

export interface Task {
    id: number;
    // Kept as string: the server may introduce kinds this client does not know
    type: string;
    title: string;
    reward: number;
    is_completed: boolean;
    category?: string;
    additional_data?: TaskAdditionalData | null;
}

export interface TaskPolicy {
    attempts: number;
    delay: number; // seconds
    enabled: boolean;
}

export type TaskStatus = 'completed' | 'submitted' | 'failed' | 'disabled'

export interface TaskOutcome {
    status: TaskStatus;
    reason?: string;
}

export interface TaskHandler {
    run(task: Task, policy: TaskPolicy): Promise<TaskOutcome>;
}
