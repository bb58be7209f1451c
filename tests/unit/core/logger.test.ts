import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { createLogger, logPlannerEvents } from '../../../src/logger/index.js'
import { makeTask, silentLogger } from '../../helpers/fixtures.js'

describe('createLogger', () => {
    it('stays quiet below warn unless debugging', () => {
        expect(createLogger({ logLevel: 'info' }).level).toBe('warn')
        expect(createLogger({ logLevel: 'warn' }).level).toBe('warn')
    })

    it('honours quieter levels', () => {
        expect(createLogger({ logLevel: 'error' }).level).toBe('error')
        expect(createLogger({ logLevel: 'silent' }).level).toBe('silent')
    })
})

describe('logPlannerEvents', () => {
    it('logs planner events until unsubscribed', () => {
        const bus = new TypedEventEmitter()
        const debug = vi.spyOn(silentLogger, 'debug')
        const stop = logPlannerEvents(bus, silentLogger)

        bus.emit('task:done', { task: makeTask('t1'), previousRemaining: 45 })
        expect(debug).toHaveBeenCalledWith({ taskId: 't1', previousRemaining: 45 }, 'Task marked done')

        stop()
        bus.emit('task:done', { task: makeTask('t1'), previousRemaining: 45 })
        expect(debug).toHaveBeenCalledTimes(1)
        debug.mockRestore()
    })
})
