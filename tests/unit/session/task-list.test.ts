import { describe, it, expect } from 'vitest'
import { Task, TaskList } from '../../../src/session/task-list.js'
import { RecordingTransport } from '../../helpers/recording-transport.js'

describe('TaskList', () => {
    it('starts ready and empty', () => {
        const list = new TaskList('session-1', new RecordingTransport())
        expect(list.status).toBe('Ready')
        expect(list.getTasks()).toEqual([])
    })

    it('adds tasks from inputs or instances', () => {
        const list = new TaskList('session-1', new RecordingTransport())
        const first = list.addTask({ title: 'Processing data', status: 'running' })
        const second = list.addTask(new Task({ title: 'Performing calculations' }))

        expect(first.status).toBe('running')
        expect(second.status).toBe('ready')
        expect(list.getTasks().map((t) => t.title)).toEqual(['Processing data', 'Performing calculations'])
    })

    it('snapshots the current state', () => {
        const list = new TaskList('session-1', new RecordingTransport())
        const task = list.addTask({ title: 'Processing data', status: 'running' })
        const before = list.snapshot()

        task.status = 'done'
        task.forId = 'm1'
        list.status = 'Done'
        const after = list.snapshot()

        expect(before).toEqual({ status: 'Ready', tasks: [{ id: task.id, title: 'Processing data', status: 'running', forId: null }] })
        expect(after).toEqual({ status: 'Done', tasks: [{ id: task.id, title: 'Processing data', status: 'done', forId: 'm1' }] })
        expect(Object.isFrozen(after.tasks[0])).toBe(true)
    })

    it('sends the snapshot for its session', async () => {
        const transport = new RecordingTransport()
        const list = new TaskList('session-1', transport)
        list.addTask({ title: 'Only task' })

        const sent = await list.send()

        expect(transport.taskLists).toEqual([{ sessionId: 'session-1', snapshot: sent }])
    })

    it('clear removes every task', () => {
        const list = new TaskList('session-1', new RecordingTransport())
        list.addTask({ title: 'a' })
        list.clear()
        expect(list.getTasks()).toEqual([])
    })
})
