import path from 'node:path'
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from '../../../src/config/defaults.js'
import { loadConfig } from '../../../src/config/loader.js'
import { ConfigError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const PROJECT = '/work/course'
const LOCAL_FILE = path.join(PROJECT, LOCAL_CONFIG_FILE)

describe('loadConfig', () => {
    const originalEnv = process.env

    beforeEach(() => {
        process.env = { ...originalEnv }
        delete process.env.STUDYWEEK_DATA_DIR
        delete process.env.STUDYWEEK_PROFILE
        delete process.env.STUDYWEEK_LOG_LEVEL
    })

    afterEach(() => {
        process.env = originalEnv
    })

    it('returns defaults when no config files exist', async () => {
        const config = await loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })
        expect(config.logLevel).toBe('info')
        expect(config.profile).toBe('default')
        expect(config.planner).toEqual({ nearTermDays: 3, dailyCapacityMinutes: 90, minSessionMinutes: 10 })
        expect(config.projectDir).toBe(PROJECT)
    })

    it('merges planner settings across files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ planner: { nearTermDays: 5, dailyCapacityMinutes: 'auto' } }))
        fs.setFile(LOCAL_FILE, JSON.stringify({ profile: 'thesis', planner: { minSessionMinutes: 0 } }))

        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.profile).toBe('thesis')
        expect(config.planner).toEqual({ nearTermDays: 5, dailyCapacityMinutes: 'auto', minSessionMinutes: 0 })
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, JSON.stringify({ dataDir: '/from/file', logLevel: 'warn' }))
        process.env.STUDYWEEK_DATA_DIR = '/from/env'
        process.env.STUDYWEEK_LOG_LEVEL = 'debug'

        const config = await loadConfig({ fs, projectDir: PROJECT })
        expect(config.dataDir).toBe('/from/env')
        expect(config.logLevel).toBe('debug')
    })

    it('CLI flags override everything', async () => {
        process.env.STUDYWEEK_PROFILE = 'env-profile'
        const config = await loadConfig({
            fs: new MockFileSystem(),
            projectDir: PROJECT,
            cliFlags: { profile: 'cli-profile', dataDir: undefined },
        })
        expect(config.profile).toBe('cli-profile')
    })

    it('skips invalid files and reports them', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, '{ not json')
        fs.setFile(LOCAL_FILE, JSON.stringify({ planner: { nearTermDays: -1 } }))
        const onInvalid = vi.fn()

        const config = await loadConfig({ fs, projectDir: PROJECT, onInvalid })
        expect(config.planner.nearTermDays).toBe(3)
        expect(onInvalid).toHaveBeenCalledTimes(2)
        expect(onInvalid).toHaveBeenCalledWith(LOCAL_FILE, expect.stringContaining('planner.nearTermDays'))
    })

    it('rejects an unknown log level from the environment', async () => {
        process.env.STUDYWEEK_LOG_LEVEL = 'loud'
        await expect(loadConfig({ fs: new MockFileSystem(), projectDir: PROJECT })).rejects.toThrow(ConfigError)
    })

    it('rejects a maximum session shorter than the minimum', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, JSON.stringify({ planner: { minSessionMinutes: 30, maxSessionMinutes: 20 } }))
        await expect(loadConfig({ fs, projectDir: PROJECT })).rejects.toThrow(
            'planner.maxSessionMinutes (20) is below planner.minSessionMinutes (30)'
        )
    })
})
