import { CancellationError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { StepTracker } from '../tracing/tracker.js'

export interface StopResult {
    /** Ids of the steps that were running when the stop arrived, innermost first. */
    stoppedSteps: string[]
}

/**
 * Owns the cancellation signal of one session. Tasks capture the signal current
 * when they start; a stop aborts that signal and installs a fresh one, so work
 * started after the stop runs normally.
 */
export class CancellationController {
    private controller = new AbortController()
    private inflight = new Map<AbortSignal, Set<Promise<void>>>()
    private pending: Promise<StopResult> | null = null
    private halting = false

    constructor(
        private sessionId: string,
        private tracker: StepTracker,
        private logger: Logger,
        private eventBus: TypedEventEmitter
    ) {}

    get signal(): AbortSignal {
        return this.controller.signal
    }

    get stopping(): boolean {
        return this.halting
    }

    /** Registers work bound to `signal` so a stop can wait for it to unwind. */
    track(signal: AbortSignal, work: Promise<unknown>): void {
        let set = this.inflight.get(signal)
        if (!set) {
            set = new Set()
            this.inflight.set(signal, set)
        }
        // settlement only; the caller of `work` observes its outcome
        const settled = work.then(
            () => undefined,
            () => undefined
        )
        const entries = set
        entries.add(settled)
        void settled.then(() => {
            entries.delete(settled)
            if (entries.size === 0 && this.inflight.get(signal) === entries) this.inflight.delete(signal)
        })
    }

    inflightCount(): number {
        let count = 0
        for (const set of this.inflight.values()) count += set.size
        return count
    }

    /**
     * Stops every running step of the session, innermost first, then runs
     * `afterNotify` (the stop hook) and waits for the aborted work to unwind.
     * Concurrent calls share one stop.
     */
    signalStop(afterNotify: () => Promise<unknown>): Promise<StopResult> {
        if (this.pending) return this.pending
        this.pending = this.stop(afterNotify).finally(() => {
            this.pending = null
        })
        return this.pending
    }

    /** Aborts outstanding work without running the stop hook. Used on teardown. */
    async abortAll(): Promise<StopResult> {
        const { stoppedSteps, signal } = this.interrupt()
        await this.drain(signal)
        return { stoppedSteps }
    }

    private async stop(afterNotify: () => Promise<unknown>): Promise<StopResult> {
        this.halting = true
        try {
            const { stoppedSteps, signal } = this.interrupt()
            this.logger.info({ sessionId: this.sessionId, stoppedSteps: stoppedSteps.length }, 'session:stop')

            await afterNotify()
            await this.drain(signal)

            this.eventBus.emit('session:stopped', { sessionId: this.sessionId, stoppedSteps: stoppedSteps.length })
            return { stoppedSteps }
        } finally {
            this.halting = false
        }
    }

    private interrupt(): { stoppedSteps: string[]; signal: AbortSignal } {
        const stoppedSteps: string[] = []
        for (const step of this.tracker.running().reverse()) {
            this.tracker.close(step.id, { status: 'stopped' })
            stoppedSteps.push(step.id)
        }

        const previous = this.controller
        this.controller = new AbortController()
        previous.abort(new CancellationError(this.sessionId))
        return { stoppedSteps, signal: previous.signal }
    }

    private async drain(signal: AbortSignal): Promise<void> {
        const set = this.inflight.get(signal)
        if (!set) return
        await Promise.all([...set])
        this.inflight.delete(signal)
    }
}
