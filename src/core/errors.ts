export type ErrorKind = 'registration' | 'session' | 'hook' | 'cancellation' | 'config'

export class ThreadloomError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ThreadloomError'
        this.kind = kind
    }
}

/** Startup-time misconfiguration of the hook table. Raised before any session exists. */
export class RegistrationError extends ThreadloomError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'registration', options)
        this.name = 'RegistrationError'
    }
}

export class DuplicateHookError extends RegistrationError {
    readonly hook: string

    constructor(hook: string) {
        super(`A handler is already registered for '${hook}'`)
        this.name = 'DuplicateHookError'
        this.hook = hook
    }
}

export class DuplicateSessionError extends ThreadloomError {
    readonly sessionId: string

    constructor(sessionId: string) {
        super(`Session '${sessionId}' already exists`, 'session')
        this.name = 'DuplicateSessionError'
        this.sessionId = sessionId
    }
}

export class SessionNotFoundError extends ThreadloomError {
    readonly sessionId: string

    constructor(sessionId: string) {
        super(`Session '${sessionId}' not found`, 'session')
        this.name = 'SessionNotFoundError'
        this.sessionId = sessionId
    }
}

export class SessionEndedError extends ThreadloomError {
    readonly sessionId: string

    constructor(sessionId: string) {
        super(`Session '${sessionId}' has ended`, 'session')
        this.name = 'SessionEndedError'
        this.sessionId = sessionId
    }
}

export class SessionLimitError extends ThreadloomError {
    constructor(limit: number) {
        super(`Session limit of ${limit} reached`, 'session')
        this.name = 'SessionLimitError'
    }
}

export class ProfileSelectionError extends ThreadloomError {
    constructor(message: string) {
        super(message, 'session')
        this.name = 'ProfileSelectionError'
    }
}

export class ResumeUnavailableError extends ThreadloomError {
    constructor(reason: string) {
        super(`Cannot resume session: ${reason}`, 'session')
        this.name = 'ResumeUnavailableError'
    }
}

export class HookError extends ThreadloomError {
    readonly hook: string

    constructor(hook: string, cause: unknown) {
        super(`Hook '${hook}' failed: ${errorMessage(cause)}`, 'hook', { cause })
        this.name = 'HookError'
        this.hook = hook
    }
}

/** Raised into a task whose session was stopped. Never surfaced to the user as an error. */
export class CancellationError extends ThreadloomError {
    readonly sessionId: string

    constructor(sessionId: string) {
        super(`Session '${sessionId}' was stopped`, 'cancellation')
        this.name = 'CancellationError'
        this.sessionId = sessionId
    }
}

export class ConfigError extends ThreadloomError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', options)
        this.name = 'ConfigError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function isCancellation(error: unknown): boolean {
    return error instanceof CancellationError || isAbortError(error)
}
