import type { Action } from '../actions/types.js'
import type { Message } from '../chat/types.js'
import type { TaskListSnapshot } from '../session/task-list.js'
import type { StepSnapshot } from '../tracing/types.js'

/**
 * Outbound side of the runtime: whatever delivers messages, steps, action
 * updates and task lists to the UI or a persistence layer. Every argument is a
 * frozen snapshot.
 */
export interface RuntimeTransport {
    sendMessage(message: Message): Promise<void> | void
    emitStep(step: StepSnapshot): Promise<void> | void
    removeAction(action: Action): Promise<void> | void
    sendTaskList(sessionId: string, snapshot: TaskListSnapshot): Promise<void> | void
}
