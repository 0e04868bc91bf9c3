/**
 * Session-fatal: the session loop stops for this account, other sessions keep running.
 */
export class InvalidSession extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'InvalidSession'
    }
}

/**
 * Web-session blob missing or rejected by the token exchange. Usually a banned or
 * logged-out account, so it is never retried.
 */
export class AuthFailure extends InvalidSession {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'AuthFailure'
    }
}

/** Non-2xx response where the caller has no soft fallback. */
export class ApiError extends Error {
    readonly status: number

    constructor(message: string, status: number) {
        super(`${message} (status ${status})`)
        this.name = 'ApiError'
        this.status = status
    }
}

export class AbortError extends Error {
    constructor(message = 'Operation aborted') {
        super(message)
        this.name = 'AbortError'
    }
}

export function isAbortError(error: unknown): error is AbortError {
    return error instanceof Error && error.name === 'AbortError'
}

export function shortErr(e: unknown): string {
    if (e == null) return 'unknown'
    if (e instanceof Error) return e.message.substring(0, 160)
    return String(e).substring(0, 160)
}
