import { AsyncLocalStorage } from 'node:async_hooks'
import type { Session } from '../session/session.js'

/**
 * Per-task execution state. Every step runs its body in a fresh context holding a
 * copy of the caller's stack, so concurrent branches forked from one task (e.g. a
 * `Promise.all` over tool calls) each see their own parent chain.
 */
export interface TaskContext {
    readonly session: Session
    /** Ids of the steps open in this task, outermost first. */
    readonly stack: readonly string[]
    /** Cancellation signal of the session at the time the task was started. */
    readonly signal: AbortSignal
}

const taskStorage = new AsyncLocalStorage<TaskContext>()

export function getTaskContext(): TaskContext | undefined {
    return taskStorage.getStore()
}

export function runInTask<T>(context: TaskContext, fn: () => T): T {
    return taskStorage.run(context, fn)
}

export function forkTask(parent: TaskContext, stepId: string): TaskContext {
    return { ...parent, stack: [...parent.stack, stepId] }
}
