import type { JsonObject } from '../core/types.js'

export interface Action {
    readonly name: string
    readonly payload: JsonObject
    readonly label: string
    readonly attachedMessageId: string | null
    readonly removed: boolean
}

export interface ActionInput {
    name: string
    payload?: Record<string, unknown>
    label?: string
}
