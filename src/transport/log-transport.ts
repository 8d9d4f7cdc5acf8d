import type { Action } from '../actions/types.js'
import type { Message } from '../chat/types.js'
import type { Logger } from '../logger/index.js'
import type { TaskListSnapshot } from '../session/task-list.js'
import type { StepSnapshot } from '../tracing/types.js'
import type { RuntimeTransport } from './types.js'

/** Default transport when none is wired in: writes every outbound update to the log. */
export class LogTransport implements RuntimeTransport {
    constructor(private logger: Logger) {}

    sendMessage(message: Message): void {
        this.logger.info(
            { sessionId: message.sessionId, messageId: message.id, author: message.author, parentStepId: message.parentStepId },
            'transport:message'
        )
    }

    emitStep(step: StepSnapshot): void {
        this.logger.debug(
            {
                sessionId: step.sessionId,
                stepId: step.id,
                parentId: step.parentId,
                type: step.type,
                name: step.name,
                status: step.status,
            },
            'transport:step'
        )
    }

    removeAction(action: Action): void {
        this.logger.debug({ action: action.name, messageId: action.attachedMessageId }, 'transport:action-removed')
    }

    sendTaskList(sessionId: string, snapshot: TaskListSnapshot): void {
        this.logger.debug({ sessionId, status: snapshot.status, tasks: snapshot.tasks.length }, 'transport:task-list')
    }
}
