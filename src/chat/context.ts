import type { Message, MessageAuthor, ProviderMessage, ProviderRole } from './types.js'

const ROLE_BY_AUTHOR: Record<MessageAuthor, ProviderRole> = {
    user: 'user',
    assistant: 'assistant',
    system: 'system',
}

export interface ProviderFormatOptions {
    exclude?: (message: Message) => boolean
}

/** Append-only message log of one session. */
export class ChatContext {
    private log: Message[] = []

    constructor(readonly sessionId: string, seed: readonly Message[] = []) {
        for (const message of seed) this.append(message)
    }

    append(message: Message): void {
        if (message.sessionId !== this.sessionId) {
            throw new Error(`Message ${message.id} belongs to session '${message.sessionId}', not '${this.sessionId}'`)
        }
        this.log.push(Object.freeze({ ...message, actions: Object.freeze([...message.actions]) }))
    }

    messages(): readonly Message[] {
        return Object.freeze(this.log.slice())
    }

    get length(): number {
        return this.log.length
    }

    toProviderFormat(options: ProviderFormatOptions = {}): ProviderMessage[] {
        const snapshot = this.log.slice()
        const { exclude } = options
        return snapshot
            .filter((message) => !exclude?.(message))
            .map((message) => ({ role: ROLE_BY_AUTHOR[message.author], content: message.content }))
    }
}
