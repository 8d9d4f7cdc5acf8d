import type { Action } from '../actions/types.js'
import type { Message } from '../chat/types.js'
import {
    CancellationError,
    DuplicateHookError,
    HookError,
    RegistrationError,
    errorMessage,
} from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { Session } from '../session/session.js'
import type { User } from '../session/types.js'
import { type StepDefinition, type StepFunction, defineStep, runStep } from '../tracing/step.js'
import type { StepOptions } from '../tracing/types.js'
import {
    type ActionCallback,
    type ChatProfile,
    ChatProfilesSchema,
    type HookContext,
    type HookKind,
    type HookOutcome,
    type HookTable,
    type Starter,
    StartersSchema,
} from './types.js'

/**
 * Process-wide table of everything an application registers: one handler per
 * lifecycle or provider kind, action callbacks by name, and step definitions.
 * Registration happens at startup; `validate()` and `seal()` close it before the
 * first session is created.
 */
export class HookDispatcher {
    private handlers: Partial<HookTable> = {}
    private actionCallbacks = new Map<string, ActionCallback>()
    private stepDefinitions = new Map<string, StepDefinition>()
    private sealed = false

    constructor(
        private logger: Logger,
        private eventBus: TypedEventEmitter
    ) {}

    register<K extends HookKind>(kind: K, handler: HookTable[K]): this {
        this.assertOpen(kind)
        if (this.handlers[kind]) throw new DuplicateHookError(kind)
        this.handlers[kind] = handler
        return this
    }

    onAction(name: string, callback: ActionCallback): this {
        this.assertOpen(`action:${name}`)
        if (this.actionCallbacks.has(name)) {
            this.logger.debug({ action: name }, 'hook:action-rebind')
        }
        this.actionCallbacks.set(name, callback)
        return this
    }

    /** Wraps `fn` as a traced step and records its definition under the step name. */
    step<A extends unknown[], R>(options: StepOptions, fn: StepFunction<A, R>): (...args: A) => Promise<R> {
        this.assertOpen('step')
        const definition = defineStep(fn, options)
        this.stepDefinitions.set(definition.name, definition)
        return (...args: A) => runStep(definition, args, () => fn(...args))
    }

    has(kind: HookKind): boolean {
        return this.handlers[kind] !== undefined
    }

    hasAction(name: string): boolean {
        return this.actionCallbacks.has(name)
    }

    listSteps(): StepDefinition[] {
        return [...this.stepDefinitions.values()]
    }

    get isSealed(): boolean {
        return this.sealed
    }

    /** Checks the provider outputs once, so a malformed starter or profile list fails startup. */
    async validate(): Promise<void> {
        const { starters, chatProfiles } = this.handlers
        if (starters) {
            const result = StartersSchema.safeParse(await this.callProvider('starters', () => starters(null)))
            if (!result.success) {
                throw new RegistrationError(`Malformed starters: ${result.error.message}`, { cause: result.error })
            }
        }
        if (chatProfiles) {
            const result = ChatProfilesSchema.safeParse(await this.callProvider('chatProfiles', () => chatProfiles(null)))
            if (!result.success) {
                throw new RegistrationError(`Malformed chat profiles: ${result.error.message}`, { cause: result.error })
            }
        }
    }

    seal(): void {
        this.sealed = true
    }

    chatStart(session: Session): Promise<HookOutcome> {
        const handler = this.handlers.chatStart
        return this.run('chatStart', session, handler && ((ctx) => handler(ctx)))
    }

    message(session: Session, message: Message): Promise<HookOutcome> {
        const handler = this.handlers.message
        return this.run('message', session, handler && ((ctx) => handler(message, ctx)))
    }

    stop(session: Session): Promise<HookOutcome> {
        const handler = this.handlers.stop
        return this.run('stop', session, handler && ((ctx) => handler(ctx)))
    }

    chatEnd(session: Session): Promise<HookOutcome> {
        const handler = this.handlers.chatEnd
        return this.run('chatEnd', session, handler && ((ctx) => handler(ctx)))
    }

    chatResume(session: Session, thread: readonly Message[]): Promise<HookOutcome> {
        const handler = this.handlers.chatResume
        return this.run('chatResume', session, handler && ((ctx) => handler(thread, ctx)))
    }

    action(session: Session, action: Action): Promise<HookOutcome> {
        const callback = this.actionCallbacks.get(action.name)
        return this.run(`action:${action.name}`, session, callback && ((ctx) => callback(action, ctx)))
    }

    async starters(user: User | null): Promise<Starter[]> {
        const provider = this.handlers.starters
        if (!provider) return []
        try {
            return StartersSchema.parse(await provider(user))
        } catch (error) {
            this.logger.error({ hook: 'starters', error: errorMessage(error) }, 'hook:error')
            return []
        }
    }

    /** Null means profile selection is denied for this user. */
    async chatProfiles(user: User | null): Promise<ChatProfile[] | null> {
        const provider = this.handlers.chatProfiles
        if (!provider) return null
        try {
            return ChatProfilesSchema.parse(await provider(user))
        } catch (error) {
            this.logger.error({ hook: 'chatProfiles', error: errorMessage(error) }, 'hook:error')
            return null
        }
    }

    async authenticate(username: string, password: string): Promise<User | null> {
        const callback = this.handlers.authCallback
        if (!callback) return null
        try {
            return await callback(username, password)
        } catch (error) {
            this.logger.error({ hook: 'authCallback', error: errorMessage(error) }, 'hook:error')
            return null
        }
    }

    private async run(
        hook: string,
        session: Session,
        call: ((context: HookContext) => unknown) | undefined
    ): Promise<HookOutcome> {
        if (!call) return { ok: true }

        const context: HookContext = { session, logger: session.logger.child({ hook }) }
        try {
            await session.runTask(() => call(context))
            return { ok: true }
        } catch (error) {
            if (error instanceof CancellationError && error.sessionId === session.id) {
                this.logger.debug({ sessionId: session.id, hook }, 'hook:cancelled')
                return { ok: false, cancelled: true }
            }

            const hookError = new HookError(hook, error)
            this.logger.error({ sessionId: session.id, hook, error: errorMessage(error) }, 'hook:error')
            this.eventBus.emit('hook:error', { sessionId: session.id, hook, error: hookError })
            await this.surface(session, hookError)
            return { ok: false, cancelled: false, error: hookError }
        }
    }

    private async surface(session: Session, error: HookError): Promise<void> {
        if (session.state === 'ended') return
        try {
            await session.send({ author: 'system', content: error.message, parentStepId: null })
        } catch (sendError) {
            this.logger.warn({ sessionId: session.id, error: errorMessage(sendError) }, 'hook:surface-failed')
        }
    }

    private async callProvider(hook: string, call: () => unknown): Promise<unknown> {
        try {
            return await call()
        } catch (error) {
            throw new RegistrationError(`Provider '${hook}' failed during validation: ${errorMessage(error)}`, {
                cause: error,
            })
        }
    }

    private assertOpen(what: string): void {
        if (this.sealed) {
            throw new RegistrationError(`Cannot register '${what}' after startup`)
        }
    }
}
