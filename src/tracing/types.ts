import type { JsonValue } from '../core/types.js'

export type StepType = 'tool' | 'llmCall' | 'embedding' | 'retrieval' | 'run' | 'other'

export type StepStatus = 'running' | 'succeeded' | 'failed' | 'stopped'

export interface Step {
    id: string
    sessionId: string
    parentId: string | null
    type: StepType
    name: string
    input: JsonValue
    output: JsonValue
    status: StepStatus
    startedAt: number
    endedAt: number | null
    children: string[]
}

export type StepSnapshot = Readonly<Omit<Step, 'children'>> & { readonly children: readonly string[] }

export interface StepTree {
    step: StepSnapshot
    children: StepTree[]
}

export interface StepOptions {
    type?: StepType
    name?: string
    /** When false the step records no input. */
    showInput?: boolean
}

export type StepOutcome =
    | { status: 'succeeded'; output: JsonValue }
    | { status: 'failed'; output: JsonValue }
    | { status: 'stopped' }
