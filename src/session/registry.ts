import type { Message } from '../chat/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import {
    DuplicateSessionError,
    ProfileSelectionError,
    RegistrationError,
    ResumeUnavailableError,
    SessionLimitError,
    SessionNotFoundError,
} from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { HookDispatcher } from '../hooks/dispatcher.js'
import type { ChatProfile, HookOutcome, Starter } from '../hooks/types.js'
import type { Logger } from '../logger/index.js'
import type { StepTreeExporter } from '../tracing/exporter.js'
import type { RuntimeTransport } from '../transport/types.js'
import type { StopResult } from './cancellation.js'
import { Session, type SessionInit } from './session.js'
import type { User } from './types.js'

export interface SessionRegistryDeps {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    dispatcher: HookDispatcher
    transport: RuntimeTransport
    exporter?: StepTreeExporter
}

export interface CreateSessionOptions {
    user?: User | null
    profile?: string | null
}

export interface ResumeSessionOptions {
    user: User | null
    profile?: string | null
}

/**
 * Owns every live session. The map is only mutated synchronously, so a
 * create and a destroy for the same id can never interleave half-way.
 */
export class SessionRegistry {
    private sessions = new Map<string, Session>()
    private teardowns = new Map<string, Promise<void>>()

    constructor(private deps: SessionRegistryDeps) {}

    async create(sessionId: string, options: CreateSessionOptions = {}): Promise<Session> {
        const session = this.admit(sessionId, { id: sessionId, user: options.user ?? null })
        await this.applyProfile(session, options.profile)

        this.deps.eventBus.emit('session:created', { sessionId, resumed: false })
        this.deps.logger.info({ sessionId, profile: session.profile }, 'session:create')
        session.detach(this.deps.dispatcher.chatStart(session))
        return session
    }

    async resume(sessionId: string, priorHistory: readonly Message[], options: ResumeSessionOptions): Promise<Session> {
        if (!this.deps.config.persistence.enabled) {
            throw new ResumeUnavailableError('persistence is disabled')
        }
        if (!this.deps.dispatcher.has('authCallback')) {
            throw new ResumeUnavailableError('no auth callback is registered')
        }
        if (!options.user) {
            throw new ResumeUnavailableError('an authenticated user is required')
        }

        const history = priorHistory.map((m) => ({ ...m, sessionId }))
        const session = this.admit(sessionId, { id: sessionId, user: options.user, history })
        await this.applyProfile(session, options.profile)

        this.deps.eventBus.emit('session:created', { sessionId, resumed: true })
        this.deps.logger.info({ sessionId, messages: history.length }, 'session:resume')
        session.detach(this.deps.dispatcher.chatResume(session, session.chatContext.messages()))
        return session
    }

    get(sessionId: string): Session | undefined {
        return this.sessions.get(sessionId)
    }

    require(sessionId: string): Session {
        const session = this.sessions.get(sessionId)
        if (!session) throw new SessionNotFoundError(sessionId)
        return session
    }

    list(): string[] {
        return [...this.sessions.keys()]
    }

    get size(): number {
        return this.sessions.size
    }

    /** Records the user's message, then runs the message hook as a task of the session. */
    async handleMessage(sessionId: string, content: string): Promise<HookOutcome> {
        const session = this.require(sessionId)
        const message = await session.send({ content, author: 'user', parentStepId: null })
        return this.deps.dispatcher.message(session, message)
    }

    /** Resolves to null when the action is unknown or already removed. */
    async handleAction(sessionId: string, name: string): Promise<HookOutcome | null> {
        const session = this.require(sessionId)
        const action = session.actions.get(name)
        if (!action || action.removed) {
            this.deps.logger.warn({ sessionId, action: name, removed: action?.removed ?? false }, 'action:ignored')
            return null
        }
        if (!this.deps.dispatcher.hasAction(name)) {
            this.deps.logger.warn({ sessionId, action: name }, 'action:no-callback')
            return null
        }
        return this.deps.dispatcher.action(session, action)
    }

    stop(sessionId: string): Promise<StopResult> {
        const session = this.require(sessionId)
        return session.cancellation.signalStop(() => this.deps.dispatcher.stop(session))
    }

    /** Connection lost: unwind in-flight work, then tear the session down. */
    async disconnect(sessionId: string): Promise<void> {
        const session = this.sessions.get(sessionId)
        if (!session) return
        if (session.tracker.running().length > 0 || session.cancellation.inflightCount() > 0) {
            await this.stop(sessionId)
        }
        await this.destroy(sessionId)
    }

    destroy(sessionId: string): Promise<void> {
        const pending = this.teardowns.get(sessionId)
        if (pending) return pending

        const session = this.sessions.get(sessionId)
        if (!session) return Promise.resolve()

        const teardown = this.teardown(session).finally(() => this.teardowns.delete(sessionId))
        this.teardowns.set(sessionId, teardown)
        return teardown
    }

    async authenticate(username: string, password: string): Promise<User | null> {
        return this.deps.dispatcher.authenticate(username, password)
    }

    starters(user: User | null = null): Promise<Starter[]> {
        return this.deps.dispatcher.starters(user)
    }

    chatProfiles(user: User | null = null): Promise<ChatProfile[] | null> {
        return this.deps.dispatcher.chatProfiles(user)
    }

    async shutdown(): Promise<void> {
        await Promise.all(this.list().map((id) => this.destroy(id)))
    }

    private admit(sessionId: string, init: SessionInit): Session {
        if (!this.deps.dispatcher.isSealed) {
            throw new RegistrationError('Runtime has not been started')
        }
        if (this.sessions.has(sessionId)) throw new DuplicateSessionError(sessionId)
        if (this.sessions.size >= this.deps.config.maxSessions) {
            this.deps.logger.warn({ sessionId, limit: this.deps.config.maxSessions }, 'session:limit')
            throw new SessionLimitError(this.deps.config.maxSessions)
        }

        const session = new Session(init, this.deps)
        this.sessions.set(sessionId, session)
        return session
    }

    private async applyProfile(session: Session, requested: string | null | undefined): Promise<void> {
        if (!requested) return

        const profiles = await this.deps.dispatcher.chatProfiles(session.user)
        if (!profiles || !profiles.some((p) => p.name === requested)) {
            this.sessions.delete(session.id)
            session.markEnded()
            throw new ProfileSelectionError(
                profiles
                    ? `Unknown chat profile '${requested}'`
                    : `Profile selection is not available for session '${session.id}'`
            )
        }
        session.profile = requested
    }

    private async teardown(session: Session): Promise<void> {
        try {
            await this.deps.dispatcher.chatEnd(session)
        } finally {
            await session.cancellation.abortAll()
            this.deps.exporter?.exportSession(session)
            session.actions.clear()
            session.markEnded()
            this.sessions.delete(session.id)
            this.deps.eventBus.emit('session:ended', { sessionId: session.id, duration: Date.now() - session.createdAt })
            this.deps.logger.info({ sessionId: session.id }, 'session:end')
        }
    }
}
