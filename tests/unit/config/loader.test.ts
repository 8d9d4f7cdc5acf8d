import { describe, it, expect } from 'vitest'
import { GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { loadConfig, resolveConfig } from '../../../src/config/loader.js'
import { ConfigError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const LOCAL_FILE = '/project/.threadloom/config.json'

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, env: {}, projectDir: '/project' })
        expect(config.logLevel).toBe('info')
        expect(config.maxSessions).toBe(1000)
        expect(config.persistence.enabled).toBe(false)
        expect(config.chatContext.excludeRemovedActionMessages).toBe(false)
        expect(config.steps.display).toBe('full')
        expect(config.projectDir).toBe('/project')
    })

    it('loads global config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ maxSessions: 5, logLevel: 'warn' }))
        const config = await loadConfig({ fs, env: {}, projectDir: '/project' })
        expect(config.maxSessions).toBe(5)
        expect(config.logLevel).toBe('warn')
    })

    it('local config overrides global', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ maxSessions: 5, logLevel: 'warn' }))
        fs.setFile(LOCAL_FILE, JSON.stringify({ maxSessions: 10 }))
        const config = await loadConfig({ fs, env: {}, projectDir: '/project' })
        expect(config.maxSessions).toBe(10)
        expect(config.logLevel).toBe('warn')
    })

    it('merges nested sections from different files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ chatContext: { excludeRemovedActionMessages: true } }))
        fs.setFile(LOCAL_FILE, JSON.stringify({ steps: { display: 'hidden' } }))
        const config = await loadConfig({ fs, env: {}, projectDir: '/project' })
        expect(config.chatContext.excludeRemovedActionMessages).toBe(true)
        expect(config.steps.display).toBe('hidden')
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, JSON.stringify({ logLevel: 'warn' }))
        const config = await loadConfig({
            fs,
            env: { THREADLOOM_LOG_LEVEL: 'debug', THREADLOOM_MAX_SESSIONS: '3' },
            projectDir: '/project',
        })
        expect(config.logLevel).toBe('debug')
        expect(config.maxSessions).toBe(3)
    })

    it('overrides win over env vars', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({
            fs,
            env: { THREADLOOM_LOG_LEVEL: 'debug' },
            overrides: { logLevel: 'error' },
            projectDir: '/project',
        })
        expect(config.logLevel).toBe('error')
    })

    it('reads THREADLOOM_PERSISTENCE as a flag', async () => {
        const fs = new MockFileSystem()
        const on = await loadConfig({ fs, env: { THREADLOOM_PERSISTENCE: '1' }, projectDir: '/project' })
        const off = await loadConfig({ fs, env: { THREADLOOM_PERSISTENCE: 'yes' }, projectDir: '/project' })
        expect(on.persistence.enabled).toBe(true)
        expect(off.persistence.enabled).toBe(false)
    })

    it('rejects a config file that is not JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, '{not json')
        const loading = loadConfig({ fs, env: {}, projectDir: '/project' })
        await expect(loading).rejects.toBeInstanceOf(ConfigError)
        await expect(loading).rejects.toThrow(`Config file ${LOCAL_FILE} is not valid JSON`)
    })

    it('rejects values outside the schema', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, JSON.stringify({ maxSessions: -1 }))
        await expect(loadConfig({ fs, env: {}, projectDir: '/project' })).rejects.toThrow(
            `Invalid config in ${LOCAL_FILE}`
        )
    })

    it('rejects a non-numeric session limit from the environment', async () => {
        const fs = new MockFileSystem()
        await expect(
            loadConfig({ fs, env: { THREADLOOM_MAX_SESSIONS: 'many' }, projectDir: '/project' })
        ).rejects.toBeInstanceOf(ConfigError)
    })
})

describe('resolveConfig', () => {
    it('fills every section from defaults', () => {
        const config = resolveConfig({ steps: { display: 'tool_calls' } }, '/work')
        expect(config).toMatchObject({
            logLevel: 'info',
            maxSessions: 1000,
            persistence: { enabled: false },
            chatContext: { excludeRemovedActionMessages: false },
            steps: { display: 'tool_calls' },
            projectDir: '/work',
        })
    })
})
