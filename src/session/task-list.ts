import { randomUUID } from 'node:crypto'
import type { RuntimeTransport } from '../transport/types.js'

export type TaskStatus = 'ready' | 'running' | 'done' | 'failed'

export interface TaskInput {
    title: string
    status?: TaskStatus
    forId?: string
}

export class Task {
    readonly id = randomUUID()
    title: string
    status: TaskStatus
    /** Message the task links to, for navigation in the chat history. */
    forId?: string

    constructor(input: TaskInput) {
        this.title = input.title
        this.status = input.status ?? 'ready'
        this.forId = input.forId
    }
}

export interface TaskSnapshot {
    readonly id: string
    readonly title: string
    readonly status: TaskStatus
    readonly forId: string | null
}

export interface TaskListSnapshot {
    readonly status: string
    readonly tasks: readonly TaskSnapshot[]
}

/**
 * Presentational list of work items shown next to the chat. Tasks are mutated in
 * place; nothing reaches the UI until `send()` pushes a snapshot.
 */
export class TaskList {
    status = 'Ready'
    private tasks: Task[] = []

    constructor(
        private sessionId: string,
        private transport: RuntimeTransport
    ) {}

    addTask(task: Task | TaskInput): Task {
        const entry = task instanceof Task ? task : new Task(task)
        this.tasks.push(entry)
        return entry
    }

    getTasks(): Task[] {
        return [...this.tasks]
    }

    clear(): void {
        this.tasks = []
    }

    snapshot(): TaskListSnapshot {
        return Object.freeze({
            status: this.status,
            tasks: Object.freeze(
                this.tasks.map((t) => Object.freeze({ id: t.id, title: t.title, status: t.status, forId: t.forId ?? null }))
            ),
        })
    }

    async send(): Promise<TaskListSnapshot> {
        const snapshot = this.snapshot()
        await this.transport.sendTaskList(this.sessionId, snapshot)
        return snapshot
    }
}
