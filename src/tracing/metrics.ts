import type { EventMap, TypedEventEmitter } from '../core/events.js'
import type { StepType } from './types.js'

interface StepMetrics {
    calls: number
    succeeded: number
    failed: number
    stopped: number
    totalDuration: number
}

export class MetricsCollector {
    private steps = new Map<StepType, StepMetrics>()
    private sessions = { created: 0, resumed: 0, ended: 0, stops: 0 }
    private hookErrors = new Map<string, number>()
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onStepClosed = ({ step, duration }: EventMap['step:closed']) => {
            const m = this.ensureStep(step.type)
            m.calls++
            m.totalDuration += duration
            if (step.status === 'succeeded') m.succeeded++
            else if (step.status === 'failed') m.failed++
            else if (step.status === 'stopped') m.stopped++
        }
        eventBus.on('step:closed', onStepClosed)
        this.cleanups.push(() => eventBus.off('step:closed', onStepClosed))

        const onCreated = ({ resumed }: EventMap['session:created']) => {
            this.sessions.created++
            if (resumed) this.sessions.resumed++
        }
        eventBus.on('session:created', onCreated)
        this.cleanups.push(() => eventBus.off('session:created', onCreated))

        const onEnded = () => {
            this.sessions.ended++
        }
        eventBus.on('session:ended', onEnded)
        this.cleanups.push(() => eventBus.off('session:ended', onEnded))

        const onStopped = () => {
            this.sessions.stops++
        }
        eventBus.on('session:stopped', onStopped)
        this.cleanups.push(() => eventBus.off('session:stopped', onStopped))

        const onHookError = ({ hook }: EventMap['hook:error']) => {
            this.hookErrors.set(hook, (this.hookErrors.get(hook) ?? 0) + 1)
        }
        eventBus.on('hook:error', onHookError)
        this.cleanups.push(() => eventBus.off('hook:error', onHookError))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    private ensureStep(type: StepType): StepMetrics {
        let m = this.steps.get(type)
        if (!m) {
            m = { calls: 0, succeeded: 0, failed: 0, stopped: 0, totalDuration: 0 }
            this.steps.set(type, m)
        }
        return m
    }

    getStepMetrics(): Map<StepType, StepMetrics> {
        return new Map([...this.steps].map(([type, m]) => [type, { ...m }]))
    }

    getSessionCounts(): { created: number; resumed: number; ended: number; active: number; stops: number } {
        return { ...this.sessions, active: this.sessions.created - this.sessions.ended }
    }

    getHookErrors(): Map<string, number> {
        return new Map(this.hookErrors)
    }

    formatStatus(): string {
        const sessions = this.getSessionCounts()
        const lines: string[] = []
        lines.push(`Sessions: ${sessions.active} active (${sessions.created} created, ${sessions.ended} ended, ${sessions.stops} stops)`)

        if (this.steps.size > 0) {
            lines.push('Step metrics:')
            for (const [type, m] of this.steps) {
                lines.push(`  ${type}: ${m.calls} calls, ${m.succeeded} ok, ${m.failed} failed, ${m.stopped} stopped`)
            }
        }

        return lines.join('\n')
    }
}
