import path from 'node:path'
import { ConfigError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    overrides?: Config
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error })
    }
    const result = ConfigSchema.safeParse(raw)
    if (!result.success) {
        throw new ConfigError(`Invalid config in ${filePath}: ${result.error.message}`, { cause: result.error })
    }
    return result.data
}

function readEnvConfig(env: NodeJS.ProcessEnv): Config {
    const raw: Record<string, unknown> = {}
    if (env.THREADLOOM_LOG_LEVEL) raw.logLevel = env.THREADLOOM_LOG_LEVEL
    if (env.THREADLOOM_MAX_SESSIONS) raw.maxSessions = Number(env.THREADLOOM_MAX_SESSIONS)
    if (env.THREADLOOM_PERSISTENCE) {
        raw.persistence = { enabled: env.THREADLOOM_PERSISTENCE === 'true' || env.THREADLOOM_PERSISTENCE === '1' }
    }

    const result = ConfigSchema.safeParse(raw)
    if (!result.success) {
        throw new ConfigError(`Invalid THREADLOOM_* environment: ${result.error.message}`, { cause: result.error })
    }
    return result.data
}

function mergeConfigs(...configs: Config[]): Config {
    return configs.reduce<Config>(
        (merged, cfg) => ({
            logLevel: cfg.logLevel ?? merged.logLevel,
            maxSessions: cfg.maxSessions ?? merged.maxSessions,
            persistence: { ...merged.persistence, ...cfg.persistence },
            chatContext: { ...merged.chatContext, ...cfg.chatContext },
            steps: { ...merged.steps, ...cfg.steps },
        }),
        {}
    )
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, overrides = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: overrides > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, readEnvConfig(env), overrides)

    return resolveConfig(merged, projectDir)
}

export function resolveConfig(config: Config = {}, projectDir = process.cwd()): ResolvedConfig {
    return {
        logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
        maxSessions: config.maxSessions ?? DEFAULT_CONFIG.maxSessions,
        persistence: {
            enabled: config.persistence?.enabled ?? DEFAULT_CONFIG.persistence.enabled,
        },
        chatContext: {
            excludeRemovedActionMessages:
                config.chatContext?.excludeRemovedActionMessages ?? DEFAULT_CONFIG.chatContext.excludeRemovedActionMessages,
        },
        steps: {
            display: config.steps?.display ?? DEFAULT_CONFIG.steps.display,
        },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
