export type MessageAuthor = 'user' | 'assistant' | 'system'

export interface Message {
    readonly id: string
    readonly sessionId: string
    readonly author: MessageAuthor
    readonly content: string
    readonly createdAt: number
    /** Step that was open in the sending task, if any. */
    readonly parentStepId: string | null
    /** Names of the actions attached to this message. */
    readonly actions: readonly string[]
}

export type ProviderRole = 'user' | 'assistant' | 'system'

export interface ProviderMessage {
    role: ProviderRole
    content: string
}
