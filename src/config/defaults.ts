import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'info',
    maxSessions: 1000,
    persistence: { enabled: false },
    chatContext: { excludeRemovedActionMessages: false },
    steps: { display: 'full' },
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/threadloom`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.threadloom'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
