import { z } from 'zod'
import type { Action } from '../actions/types.js'
import type { Message } from '../chat/types.js'
import type { HookError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { Session } from '../session/session.js'
import type { User } from '../session/types.js'

export interface HookContext {
    session: Session
    logger: Logger
}

type MaybePromise<T> = T | Promise<T>

export const StarterSchema = z.object({
    label: z.string().min(1),
    message: z.string().min(1),
    icon: z.string().optional(),
})

export const StartersSchema = z.array(StarterSchema)

export const ChatProfileSchema = z.object({
    name: z.string().min(1),
    description: z.string(),
    icon: z.string().optional(),
})

export const ChatProfilesSchema = z
    .array(ChatProfileSchema)
    .refine((profiles) => new Set(profiles.map((p) => p.name)).size === profiles.length, {
        message: 'Chat profile names must be unique',
    })
    .nullable()

export type Starter = z.infer<typeof StarterSchema>
export type ChatProfile = z.infer<typeof ChatProfileSchema>

export interface LifecycleHooks {
    chatStart: (context: HookContext) => MaybePromise<void>
    message: (message: Message, context: HookContext) => MaybePromise<void>
    stop: (context: HookContext) => MaybePromise<void>
    chatEnd: (context: HookContext) => MaybePromise<void>
    chatResume: (thread: readonly Message[], context: HookContext) => MaybePromise<void>
}

export interface ProviderHooks {
    starters: (user: User | null) => MaybePromise<Starter[]>
    /** Returning null denies profile selection for that user. */
    chatProfiles: (user: User | null) => MaybePromise<ChatProfile[] | null>
    authCallback: (username: string, password: string) => MaybePromise<User | null>
}

export type HookTable = LifecycleHooks & ProviderHooks

export type HookKind = keyof HookTable

export type ActionCallback = (action: Action, context: HookContext) => MaybePromise<void>

export type HookOutcome =
    | { ok: true }
    | { ok: false; cancelled: true }
    | { ok: false; cancelled: false; error: HookError }
