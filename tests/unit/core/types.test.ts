import { describe, it, expect } from 'vitest'
import { isJsonObject, toJsonValue } from '../../../src/core/types.js'

describe('toJsonValue', () => {
    it('passes JSON primitives through', () => {
        expect(toJsonValue('text')).toBe('text')
        expect(toJsonValue(3)).toBe(3)
        expect(toJsonValue(false)).toBe(false)
        expect(toJsonValue(null)).toBeNull()
    })

    it('maps values JSON cannot carry', () => {
        expect(toJsonValue(undefined)).toBeNull()
        expect(toJsonValue(Number.NaN)).toBeNull()
        expect(toJsonValue(10n)).toBe('10')
        expect(toJsonValue(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z')
        expect(toJsonValue(function lookup() {})).toBe('[Function lookup]')
        expect(toJsonValue(new TypeError('bad input'))).toEqual({ name: 'TypeError', message: 'bad input' })
    })

    it('maps an invalid date to null', () => {
        expect(toJsonValue(new Date('not a date'))).toBeNull()
        expect(toJsonValue({ when: new Date(Number.NaN) })).toEqual({ when: null })
    })

    it('records a throwing getter instead of failing', () => {
        const value = {
            ok: 1,
            get broken(): number {
                throw new Error('nope')
            },
        }
        expect(toJsonValue(value)).toEqual({ ok: 1, broken: '[Thrown: nope]' })
    })

    it('converts collections', () => {
        expect(toJsonValue(new Set([1, 2]))).toEqual([1, 2])
        expect(toJsonValue(new Map<unknown, unknown>([[1, 'a'], ['b', undefined]]))).toEqual({ '1': 'a', b: null })
        expect(toJsonValue({ a: 1, skip: undefined, nested: [{ b: 'x' }] })).toEqual({ a: 1, nested: [{ b: 'x' }] })
    })

    it('marks circular references', () => {
        const node: Record<string, unknown> = { name: 'root' }
        node.self = node
        expect(toJsonValue(node)).toEqual({ name: 'root', self: '[Circular]' })
    })

    it('keeps shared non-circular references', () => {
        const shared = { v: 1 }
        expect(toJsonValue([shared, shared])).toEqual([{ v: 1 }, { v: 1 }])
    })
})

describe('isJsonObject', () => {
    it('accepts plain objects only', () => {
        expect(isJsonObject({ a: 1 })).toBe(true)
        expect(isJsonObject([1])).toBe(false)
        expect(isJsonObject(null)).toBe(false)
        expect(isJsonObject('x')).toBe(false)
    })
})
