import type { TypedEventEmitter } from '../core/events.js'
import { isJsonObject, toJsonValue } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { RuntimeTransport } from '../transport/types.js'
import type { Action, ActionInput } from './types.js'

export function createAction(input: ActionInput, attachedMessageId: string | null = null): Action {
    const payload = toJsonValue(input.payload ?? {})
    return Object.freeze({
        name: input.name,
        payload: isJsonObject(payload) ? payload : {},
        label: input.label ?? input.name,
        attachedMessageId,
        removed: false,
    })
}

function isSameBinding(current: Action, action: Action): boolean {
    if (current === action) return true
    return action.attachedMessageId !== null && current.attachedMessageId === action.attachedMessageId
}

/** Actions currently bound in one session, keyed by name. */
export class ActionRegistry {
    private actions = new Map<string, Action>()

    constructor(
        private sessionId: string,
        private transport: RuntimeTransport,
        private eventBus: TypedEventEmitter,
        private logger: Logger
    ) {}

    /** A later action with the same name replaces the earlier binding. */
    attach(action: Action): void {
        if (this.actions.has(action.name)) {
            this.logger.debug({ sessionId: this.sessionId, action: action.name }, 'action:rebind')
        }
        this.actions.set(action.name, action)
    }

    get(name: string): Action | undefined {
        return this.actions.get(name)
    }

    isRemoved(name: string): boolean {
        return this.actions.get(name)?.removed ?? false
    }

    /**
     * Removes `action` if it is still the binding for its name. An action whose name
     * was since rebound to a later message is left alone, as is the later one.
     */
    async remove(action: Action): Promise<boolean> {
        const current = this.actions.get(action.name)
        if (!current || current.removed || !isSameBinding(current, action)) return false

        const removed = Object.freeze({ ...current, removed: true })
        this.actions.set(action.name, removed)
        this.eventBus.emit('action:removed', { sessionId: this.sessionId, action: removed })
        await this.transport.removeAction(removed)
        return true
    }

    list(): Action[] {
        return [...this.actions.values()]
    }

    clear(): void {
        this.actions.clear()
    }
}
