import { describe, it, expect } from 'vitest'
import { createLogger, createSilentLogger } from '../../../src/logger/index.js'

describe('createLogger', () => {
    it('uses the configured level', () => {
        const logger = createLogger({ logLevel: 'warn' })
        expect(logger.level).toBe('warn')
        expect(logger.isLevelEnabled('info')).toBe(false)
        expect(logger.isLevelEnabled('error')).toBe(true)
    })

    it('silent logger writes nothing', () => {
        const logger = createSilentLogger()
        expect(logger.level).toBe('silent')
        expect(logger.isLevelEnabled('fatal')).toBe(false)
    })

    it('child loggers inherit the level', () => {
        const child = createLogger({ logLevel: 'error' }).child({ sessionId: 's1' })
        expect(child.level).toBe('error')
    })
})
