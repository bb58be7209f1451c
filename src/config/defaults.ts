import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? '~'

export const APP_NAME = 'studyweek'
export const DEFAULT_PROFILE = 'default'

export const CONFIG_DIR = path.join(HOME, '.config', APP_NAME)
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = `.${APP_NAME}`
export const LOCAL_CONFIG_FILE = path.join(LOCAL_CONFIG_DIR, 'config.json')
export const DEFAULT_DATA_DIR = path.join(HOME, '.local', 'share', APP_NAME)

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'info',
    dataDir: DEFAULT_DATA_DIR,
    profile: DEFAULT_PROFILE,
    planner: {
        nearTermDays: 3,
        dailyCapacityMinutes: 90,
        minSessionMinutes: 10,
    },
}
