import type { JsonObject } from '../core/types.js'

export type SessionState = 'active' | 'stopping' | 'ended'

export interface User {
    identifier: string
    metadata: JsonObject
}
