import { delay, raceSignal } from '../core/abort.js'
import { CancellationError, errorMessage, isCancellation } from '../core/errors.js'
import { type JsonValue, toJsonValue } from '../core/types.js'
import type { Session } from '../session/session.js'
import { forkTask, getTaskContext, runInTask } from './context.js'
import type { StepTracker } from './tracker.js'
import type { StepOptions, StepSnapshot, StepType } from './types.js'

/** Conversion for the step record only; it never changes what the caller sees. */
function recordable(value: unknown): JsonValue {
    try {
        return toJsonValue(value)
    } catch (error) {
        return `[Unserializable: ${errorMessage(error)}]`
    }
}

export interface StepDefinition {
    name: string
    type: StepType
    showInput: boolean
}

export type StepFunction<A extends unknown[], R> = (...args: A) => Promise<R> | R

/**
 * Handle on the step open in the calling task. Lets the body replace the
 * recorded input or output; the default output is the return value.
 */
export class StepHandle {
    constructor(
        private tracker: StepTracker,
        readonly id: string
    ) {}

    get snapshot(): StepSnapshot | undefined {
        return this.tracker.get(this.id)
    }

    setInput(value: unknown): boolean {
        return this.tracker.setInput(this.id, recordable(value))
    }

    setOutput(value: unknown): boolean {
        return this.tracker.setOutput(this.id, recordable(value))
    }
}

export function defineStep(fn: { name: string }, options: StepOptions = {}): StepDefinition {
    return {
        name: options.name ?? (fn.name || 'step'),
        type: options.type ?? 'other',
        showInput: options.showInput ?? true,
    }
}

/**
 * Wraps `fn` so that each invocation inside a session task is recorded as a step,
 * nested under whichever step the caller is running in.
 *
 * @example
 * ```typescript
 * const search = step({ type: 'retrieval' }, async function search(query: string) {
 *     return index.lookup(query)
 * })
 * ```
 */
export function step<A extends unknown[], R>(fn: StepFunction<A, R>): (...args: A) => Promise<R>
export function step<A extends unknown[], R>(options: StepOptions, fn: StepFunction<A, R>): (...args: A) => Promise<R>
export function step<A extends unknown[], R>(
    optionsOrFn: StepOptions | StepFunction<A, R>,
    maybeFn?: StepFunction<A, R>
): (...args: A) => Promise<R> {
    const options: StepOptions = typeof optionsOrFn === 'function' ? {} : optionsOrFn
    const fn = typeof optionsOrFn === 'function' ? optionsOrFn : maybeFn
    if (!fn) throw new TypeError('step() requires a function to wrap')

    const definition = defineStep(fn, options)
    return (...args: A) => runStep(definition, args, () => fn(...args))
}

export async function runStep<R>(definition: StepDefinition, args: unknown[], body: () => Promise<R> | R): Promise<R> {
    const context = getTaskContext()
    if (!context) return body()

    const { session, signal } = context
    const cancelled = () => new CancellationError(session.id)
    if (signal.aborted) throw cancelled()

    const opened = session.tracker.open({
        type: definition.type,
        name: definition.name,
        parentId: context.stack.at(-1) ?? null,
        input: definition.showInput ? recordable(args) : null,
    })

    const execution = new Promise<R>((resolve) => resolve(runInTask(forkTask(context, opened.id), body)))
    const settled = raceSignal(execution, signal, cancelled)
    session.cancellation.track(signal, settled)

    let result: R
    try {
        result = await settled
    } catch (error) {
        if (signal.aborted && isCancellation(error)) {
            session.tracker.close(opened.id, { status: 'stopped' })
        } else {
            session.tracker.close(opened.id, { status: 'failed', output: errorMessage(error) })
        }
        throw error
    }

    session.tracker.close(opened.id, { status: 'succeeded', output: recordable(result) })
    return result
}

export function currentStep(): StepHandle | undefined {
    const context = getTaskContext()
    const id = context?.stack.at(-1)
    if (!context || !id) return undefined
    return new StepHandle(context.session.tracker, id)
}

export function currentSession(): Session | undefined {
    return getTaskContext()?.session
}

/** Suspension point that rejects with `CancellationError` once the task's session is stopped. */
export function checkpoint(): void {
    const context = getTaskContext()
    if (context?.signal.aborted) throw new CancellationError(context.session.id)
}

export function sleep(ms: number): Promise<void> {
    const context = getTaskContext()
    if (!context) return delay(ms)
    const { session, signal } = context
    return delay(ms, signal, () => new CancellationError(session.id))
}
