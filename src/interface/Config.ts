import type { TaskKind, TaskPolicy } from './Task'

export interface Config {
    baseURL: string;
    adsURL: string;

    // Seconds; upper bound of the random delay before a session starts
    sessionStartDelay: number;
    // Seconds a bearer token is trusted before re-authentication
    tokenLifetime: number;

    sessionWaitDelay: Range;
    actionDelay: Range;

    clanName: string;
    speedtest: ConfigSpeedtest;

    proxy: ConfigProxy;
    http: ConfigHttp;
    tasks: ConfigTasks;
    vouchers: ConfigVouchers;
    durovJump: ConfigDurovJump;
    logging: ConfigLogging;

    blacklistedSessions: string[];
}

export interface Range {
    min: number;
    max: number;
}

export interface ConfigSpeedtest {
    download: Range; // Mbps
    upload: Range; // Mbps
}

export interface ConfigProxy {
    enabled: boolean;
    disableReplace: boolean;
    file: string;
    sessionsPerProxy: number;
    checkURL: string;
    checkTimeout: number; // ms
}

export interface ConfigHttp {
    timeout: number; // ms
}

export interface ConfigTasks {
    subscribeTelegram: boolean;
    policies: Record<TaskKind, TaskPolicy>;
}

export interface ConfigVouchers {
    enabled: boolean;
    minBalance: number;
    percent: number;
    targetSession: string;
    storageFile: string;
}

export interface ConfigDurovJump {
    enabled: boolean;
    score: Range;
    duration: Range; // seconds
}

export interface ConfigLogging {
    debug: boolean;
    colors: boolean;
    excludeFunc: string[];
    traceDir: string;
}
