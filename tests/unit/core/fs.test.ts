import { describe, it, expect } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'

describe('MockFileSystem', () => {
    it('reads text that was set', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/test.txt', 'hello')
        expect(await fs.readText('/test.txt')).toBe('hello')
    })

    it('parses JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/test.json', JSON.stringify({ key: 'value' }))
        expect(await fs.readJSON('/test.json')).toEqual({ key: 'value' })
    })

    it('throws on missing file', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/missing.txt')).rejects.toThrow('ENOENT')
    })

    it('checks existence', async () => {
        const fs = new MockFileSystem()
        expect(await fs.exists('/missing.txt')).toBe(false)
        fs.setFile('/exists.txt', 'data')
        expect(await fs.exists('/exists.txt')).toBe(true)
    })
})
