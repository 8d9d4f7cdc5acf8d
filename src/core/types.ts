import { errorMessage } from './errors.js'

export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject

export interface JsonObject {
    [key: string]: JsonValue
}

/**
 * Converts an arbitrary runtime value (call arguments, return values, action payloads)
 * into a JSON-safe structure so it can be handed to the transport as-is.
 */
export function toJsonValue(value: unknown): JsonValue {
    return convert(value, new WeakSet())
}

function convert(value: unknown, seen: WeakSet<object>): JsonValue {
    if (value === null || value === undefined) return null
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return value
        case 'number':
            return Number.isFinite(value) ? value : null
        case 'bigint':
            return value.toString()
        case 'symbol':
            return value.toString()
        case 'function':
            return `[Function ${value.name || 'anonymous'}]`
    }

    if (typeof value !== 'object') return null
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString()
    if (value instanceof Error) return { name: value.name, message: value.message }
    if (seen.has(value)) return '[Circular]'
    seen.add(value)

    try {
        if (Array.isArray(value)) {
            return value.map((item) => convert(item, seen))
        }
        if (value instanceof Set) {
            return [...value].map((item) => convert(item, seen))
        }
        const result: JsonObject = {}
        if (value instanceof Map) {
            for (const [key, item] of value) {
                result[String(key)] = convert(item, seen)
            }
            return result
        }
        for (const key of Object.keys(value)) {
            let item: unknown
            try {
                item = Reflect.get(value, key)
            } catch (error) {
                // a throwing getter is recorded, not propagated
                result[key] = `[Thrown: ${errorMessage(error)}]`
                continue
            }
            if (item === undefined) continue
            result[key] = convert(item, seen)
        }
        return result
    } finally {
        // siblings may legitimately share a reference
        seen.delete(value)
    }
}

export function isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}
