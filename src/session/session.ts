import { randomUUID } from 'node:crypto'
import { ActionRegistry, createAction } from '../actions/registry.js'
import type { ActionInput } from '../actions/types.js'
import { ChatContext } from '../chat/context.js'
import type { Message, MessageAuthor, ProviderMessage } from '../chat/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import { raceSignal } from '../core/abort.js'
import { CancellationError, SessionEndedError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import { type TaskContext, getTaskContext, runInTask } from '../tracing/context.js'
import { StepTracker } from '../tracing/tracker.js'
import type { StepSnapshot } from '../tracing/types.js'
import type { RuntimeTransport } from '../transport/types.js'
import { CancellationController } from './cancellation.js'
import { TaskList } from './task-list.js'
import type { SessionState, User } from './types.js'

export interface SessionDeps {
    config: Pick<ResolvedConfig, 'chatContext' | 'steps'>
    logger: Logger
    eventBus: TypedEventEmitter
    transport: RuntimeTransport
}

export interface SessionInit {
    id: string
    user?: User | null
    profile?: string | null
    history?: readonly Message[]
}

export interface SendInput {
    content: string
    author?: MessageAuthor
    actions?: ActionInput[]
    /** Defaults to the step open in the calling task. */
    parentStepId?: string | null
}

function isDisplayed(display: ResolvedConfig['steps']['display'], step: StepSnapshot): boolean {
    if (display === 'hidden') return false
    if (display === 'tool_calls') return step.type === 'tool'
    return true
}

export class Session {
    readonly id: string
    readonly createdAt = Date.now()
    readonly user: User | null
    readonly logger: Logger
    readonly chatContext: ChatContext
    readonly tracker: StepTracker
    readonly actions: ActionRegistry
    readonly taskList: TaskList
    readonly cancellation: CancellationController
    profile: string | null

    private ended = false
    private background = new Set<Promise<unknown>>()

    constructor(
        init: SessionInit,
        private deps: SessionDeps
    ) {
        this.id = init.id
        this.user = init.user ?? null
        this.profile = init.profile ?? null
        this.logger = deps.logger.child({ sessionId: init.id })
        this.chatContext = new ChatContext(init.id, init.history)
        this.tracker = new StepTracker(init.id, this.logger, deps.eventBus, (step) => this.emitStep(step))
        this.actions = new ActionRegistry(init.id, deps.transport, deps.eventBus, this.logger)
        this.taskList = new TaskList(init.id, deps.transport)
        this.cancellation = new CancellationController(init.id, this.tracker, this.logger, deps.eventBus)
    }

    get state(): SessionState {
        if (this.ended) return 'ended'
        return this.cancellation.stopping ? 'stopping' : 'active'
    }

    /**
     * Runs `fn` as a task of this session: steps it opens are recorded here and
     * it is abandoned at its next suspension point if the session is stopped.
     * Called from inside a task of the same session, the caller's stack is kept.
     */
    runTask<T>(fn: () => Promise<T> | T): Promise<T> {
        if (this.ended) return Promise.reject(new SessionEndedError(this.id))

        const outer = getTaskContext()
        const context: TaskContext =
            outer?.session === this ? outer : { session: this, stack: [], signal: this.cancellation.signal }

        const task = new Promise<T>((resolve) => resolve(runInTask(context, fn)))
        const settled = raceSignal(task, context.signal, () => new CancellationError(this.id))
        this.cancellation.track(context.signal, settled)
        return settled
    }

    /** Keeps a detached piece of work reachable so `settled()` can wait for it. */
    detach(work: Promise<unknown>): void {
        const entry = work.then(
            () => undefined,
            (error: unknown) => this.logger.error({ error: errorMessage(error) }, 'session:background-failed')
        )
        this.background.add(entry)
        void entry.then(() => this.background.delete(entry))
    }

    /** Resolves once every detached piece of work (e.g. the chat-start hook) has finished. */
    async settled(): Promise<void> {
        while (this.background.size > 0) {
            await Promise.all([...this.background])
        }
    }

    async send(input: SendInput): Promise<Message> {
        if (this.ended) throw new SessionEndedError(this.id)

        const context = getTaskContext()
        const inheritedStep = context?.session === this ? (context.stack.at(-1) ?? null) : null
        const id = randomUUID()
        const actions = (input.actions ?? []).map((a) => createAction(a, id))

        const message: Message = Object.freeze({
            id,
            sessionId: this.id,
            author: input.author ?? 'assistant',
            content: input.content,
            createdAt: Date.now(),
            parentStepId: input.parentStepId === undefined ? inheritedStep : input.parentStepId,
            actions: Object.freeze(actions.map((a) => a.name)),
        })

        this.chatContext.append(message)
        for (const action of actions) this.actions.attach(action)
        this.deps.eventBus.emit('message:appended', { message })
        await this.deps.transport.sendMessage(message)
        return message
    }

    /**
     * Conversation in model-provider shape. With `excludeRemovedActionMessages`,
     * messages whose attached actions have all been removed are left out.
     */
    providerMessages(): ProviderMessage[] {
        if (!this.deps.config.chatContext.excludeRemovedActionMessages) {
            return this.chatContext.toProviderFormat()
        }
        return this.chatContext.toProviderFormat({
            exclude: (message) =>
                message.actions.length > 0 &&
                message.actions.every((name) => {
                    const action = this.actions.get(name)
                    return action !== undefined && action.attachedMessageId === message.id && action.removed
                }),
        })
    }

    markEnded(): void {
        this.ended = true
    }

    private emitStep(step: StepSnapshot): void {
        if (!isDisplayed(this.deps.config.steps.display, step)) return
        void Promise.resolve()
            .then(() => this.deps.transport.emitStep(step))
            .catch((error: unknown) => {
                this.logger.warn({ stepId: step.id, error: errorMessage(error) }, 'step:emit-failed')
            })
    }
}
