import type { Action } from '../actions/types.js'
import type { Message } from '../chat/types.js'
import type { StepSnapshot } from '../tracing/types.js'

export type EventMap = {
    'session:created': { sessionId: string; resumed: boolean }
    'session:stopped': { sessionId: string; stoppedSteps: number }
    'session:ended': { sessionId: string; duration: number }
    'step:opened': { sessionId: string; stepId: string; parentId: string | null }
    'step:closed': { step: StepSnapshot; duration: number }
    'message:appended': { message: Message }
    'hook:error': { sessionId: string; hook: string; error: Error }
    'action:removed': { sessionId: string; action: Action }
}

type EventHandler<T> = (data: T) => void

type Handlers = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: Handlers = {}

    constructor(private onListenerError?: (event: keyof EventMap, error: unknown) => void) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> = this.handlers[event] ?? new Set()
        set.add(handler)
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch (error) {
                // listeners are cross-cutting; report and keep dispatching
                this.onListenerError?.(event, error)
            }
        }
    }

    listenerCount(event: keyof EventMap): number {
        return this.handlers[event]?.size ?? 0
    }

    removeAll(): void {
        this.handlers = {}
    }
}
