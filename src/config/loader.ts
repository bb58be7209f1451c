import path from 'node:path'
import { ConfigError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    /** Receives the path and reason of every config file that was skipped. */
    onInvalid?: (filePath: string, reason: string) => void
}

async function loadJsonConfig(
    fs: FileSystem,
    filePath: string,
    onInvalid?: LoadConfigOptions['onInvalid']
): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}
    try {
        const raw = await fs.readJSON<unknown>(filePath)
        const parsed = ConfigSchema.safeParse(raw)
        if (parsed.success) return parsed.data
        onInvalid?.(filePath, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '))
    } catch (error) {
        onInvalid?.(filePath, error instanceof Error ? error.message : String(error))
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.dataDir !== undefined) merged.dataDir = cfg.dataDir
        if (cfg.profile !== undefined) merged.profile = cfg.profile
        if (cfg.planner !== undefined) {
            const planner = { ...merged.planner }
            for (const [key, value] of Object.entries(cfg.planner)) {
                if (value !== undefined) Object.assign(planner, { [key]: value })
            }
            merged.planner = planner
        }
    }
    return merged
}

function envConfig(): Config {
    const env: Config = {}
    if (process.env.STUDYWEEK_DATA_DIR) env.dataDir = process.env.STUDYWEEK_DATA_DIR
    if (process.env.STUDYWEEK_PROFILE) env.profile = process.env.STUDYWEEK_PROFILE
    if (process.env.STUDYWEEK_LOG_LEVEL) {
        const level = LogLevelSchema.safeParse(process.env.STUDYWEEK_LOG_LEVEL)
        if (!level.success) {
            throw new ConfigError(`STUDYWEEK_LOG_LEVEL must be one of ${LogLevelSchema.options.join(', ')}`)
        }
        env.logLevel = level.data
    }
    return env
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), onInvalid } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, onInvalid)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE), onInvalid)

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(), cliFlags)

    const planner = { ...DEFAULT_CONFIG.planner, ...merged.planner }
    if (planner.maxSessionMinutes !== undefined && planner.maxSessionMinutes < planner.minSessionMinutes) {
        throw new ConfigError(
            `planner.maxSessionMinutes (${planner.maxSessionMinutes}) is below planner.minSessionMinutes (${planner.minSessionMinutes})`
        )
    }

    return {
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        dataDir: merged.dataDir ?? DEFAULT_CONFIG.dataDir,
        profile: merged.profile ?? DEFAULT_CONFIG.profile,
        planner,
        projectDir,
        configDir: CONFIG_DIR,
    }
}
