import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

const payload = { weekStart: '2026-10-19', sessions: 3, unscheduledMinutes: 0 }

describe('TypedEventEmitter', () => {
    it('delivers events to subscribed handlers', () => {
        const bus = new TypedEventEmitter()
        const handler = vi.fn()
        bus.on('plan:generated', handler)
        bus.emit('plan:generated', payload)
        expect(handler).toHaveBeenCalledWith(payload)
    })

    it('stops delivering after off', () => {
        const bus = new TypedEventEmitter()
        const handler = vi.fn()
        bus.on('plan:generated', handler)
        bus.off('plan:generated', handler)
        bus.emit('plan:generated', payload)
        expect(handler).not.toHaveBeenCalled()
    })

    it('keeps going when a handler throws', () => {
        const bus = new TypedEventEmitter()
        const after = vi.fn()
        bus.on('plan:generated', () => {
            throw new Error('listener failed')
        })
        bus.on('plan:generated', after)
        expect(() => bus.emit('plan:generated', payload)).not.toThrow()
        expect(after).toHaveBeenCalledOnce()
    })

    it('removeAll drops every handler', () => {
        const bus = new TypedEventEmitter()
        const handler = vi.fn()
        bus.on('plan:generated', handler)
        bus.removeAll()
        bus.emit('plan:generated', payload)
        expect(handler).not.toHaveBeenCalled()
    })
})
