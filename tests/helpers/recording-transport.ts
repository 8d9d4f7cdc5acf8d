import type { Action } from '../../src/actions/types.js'
import type { Message } from '../../src/chat/types.js'
import type { TaskListSnapshot } from '../../src/session/task-list.js'
import type { StepSnapshot } from '../../src/tracing/types.js'
import type { RuntimeTransport } from '../../src/transport/types.js'

export interface TaskListPush {
    sessionId: string
    snapshot: TaskListSnapshot
}

/** In-process transport that keeps everything the runtime pushes out. */
export class RecordingTransport implements RuntimeTransport {
    readonly messages: Message[] = []
    readonly steps: StepSnapshot[] = []
    readonly removedActions: Action[] = []
    readonly taskLists: TaskListPush[] = []
    failSteps = false

    sendMessage(message: Message): void {
        this.messages.push(message)
    }

    emitStep(step: StepSnapshot): void {
        if (this.failSteps) throw new Error('step sink unavailable')
        this.steps.push(step)
    }

    removeAction(action: Action): void {
        this.removedActions.push(action)
    }

    sendTaskList(sessionId: string, snapshot: TaskListSnapshot): void {
        this.taskLists.push({ sessionId, snapshot })
    }

    messagesFor(sessionId: string): Message[] {
        return this.messages.filter((m) => m.sessionId === sessionId)
    }
}
