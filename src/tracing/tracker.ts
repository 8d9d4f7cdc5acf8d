import { randomUUID } from 'node:crypto'
import type { TypedEventEmitter } from '../core/events.js'
import type { JsonValue } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { Step, StepOutcome, StepSnapshot, StepTree, StepType } from './types.js'

export type StepSink = (step: StepSnapshot) => void

interface OpenStepParams {
    type: StepType
    name: string
    parentId: string | null
    input: JsonValue
}

function freeze(step: Step): StepSnapshot {
    return Object.freeze({ ...structuredClone(step), children: Object.freeze([...step.children]) })
}

/**
 * Arena of the steps opened in one session. Parent/child links are ids, so the
 * arena owns every step and teardown is a single clear.
 *
 * The tracker does not know which step is "current": that lives in the task
 * context of whoever is calling, see `tracing/context.ts`.
 */
export class StepTracker {
    private steps = new Map<string, Step>()
    private overridden = new Map<string, Set<'input' | 'output'>>()
    private runningIds = new Set<string>()

    constructor(
        readonly sessionId: string,
        private logger: Logger,
        private eventBus: TypedEventEmitter,
        private sink?: StepSink
    ) {}

    open(params: OpenStepParams): StepSnapshot {
        const parent = params.parentId ? this.steps.get(params.parentId) : undefined
        if (params.parentId && !parent) {
            throw new Error(`Unknown parent step '${params.parentId}' in session '${this.sessionId}'`)
        }

        const step: Step = {
            id: randomUUID(),
            sessionId: this.sessionId,
            parentId: params.parentId,
            type: params.type,
            name: params.name,
            input: params.input,
            output: null,
            status: 'running',
            startedAt: Math.max(Date.now(), parent?.startedAt ?? 0),
            endedAt: null,
            children: [],
        }

        this.steps.set(step.id, step)
        this.runningIds.add(step.id)
        parent?.children.push(step.id)

        this.logger.debug({ stepId: step.id, parentId: step.parentId, type: step.type, name: step.name }, 'step:open')
        this.eventBus.emit('step:opened', { sessionId: this.sessionId, stepId: step.id, parentId: step.parentId })
        return freeze(step)
    }

    /** Closing an already-closed step returns its snapshot unchanged. */
    close(id: string, outcome: StepOutcome): StepSnapshot {
        const step = this.require(id)
        if (step.endedAt !== null) return freeze(step)

        step.status = outcome.status
        if (outcome.status === 'failed' || (outcome.status === 'succeeded' && !this.isOverridden(id, 'output'))) {
            step.output = outcome.output
        }
        step.endedAt = Math.max(Date.now(), step.startedAt)
        this.runningIds.delete(id)
        this.overridden.delete(id)

        const snapshot = freeze(step)
        const duration = step.endedAt - step.startedAt
        this.logger.debug({ stepId: id, status: step.status, duration }, 'step:close')
        this.eventBus.emit('step:closed', { step: snapshot, duration })
        this.sink?.(snapshot)
        return snapshot
    }

    setInput(id: string, value: JsonValue): boolean {
        return this.override(id, 'input', value)
    }

    setOutput(id: string, value: JsonValue): boolean {
        return this.override(id, 'output', value)
    }

    get(id: string): StepSnapshot | undefined {
        const step = this.steps.get(id)
        return step ? freeze(step) : undefined
    }

    isRunning(id: string): boolean {
        return this.runningIds.has(id)
    }

    /** Running steps, oldest first. */
    running(): StepSnapshot[] {
        return [...this.runningIds].map((id) => freeze(this.require(id)))
    }

    roots(): StepSnapshot[] {
        return [...this.steps.values()].filter((s) => s.parentId === null).map(freeze)
    }

    children(id: string): StepSnapshot[] {
        return this.require(id).children.map((childId) => freeze(this.require(childId)))
    }

    tree(rootId: string): StepTree {
        return {
            step: freeze(this.require(rootId)),
            children: this.require(rootId).children.map((childId) => this.tree(childId)),
        }
    }

    all(): StepSnapshot[] {
        return [...this.steps.values()].map(freeze)
    }

    get size(): number {
        return this.steps.size
    }

    clear(): void {
        this.steps.clear()
        this.overridden.clear()
        this.runningIds.clear()
    }

    private override(id: string, field: 'input' | 'output', value: JsonValue): boolean {
        const step = this.require(id)
        if (step.endedAt !== null) return false

        step[field] = value
        const fields = this.overridden.get(id) ?? new Set()
        fields.add(field)
        this.overridden.set(id, fields)
        return true
    }

    private isOverridden(id: string, field: 'input' | 'output'): boolean {
        return this.overridden.get(id)?.has(field) ?? false
    }

    private require(id: string): Step {
        const step = this.steps.get(id)
        if (!step) throw new Error(`Unknown step '${id}' in session '${this.sessionId}'`)
        return step
    }
}
