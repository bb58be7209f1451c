import { describe, it, expect } from 'vitest'
import {
    ConfigError,
    errorMessage,
    isStudyWeekError,
    StorageError,
    StudyWeekError,
    ValidationError,
} from '../../../src/core/errors.js'

describe('StudyWeekError', () => {
    it('tags each subclass with its code and name', () => {
        const config = new ConfigError('bad rule')
        const validation = new ValidationError('bad input')
        const storage = new StorageError('disk full')

        expect(config).toBeInstanceOf(StudyWeekError)
        expect(config.code).toBe('config')
        expect(config.name).toBe('ConfigError')
        expect(validation.code).toBe('validation')
        expect(validation.name).toBe('ValidationError')
        expect(storage.code).toBe('storage')
        expect(storage.name).toBe('StorageError')
    })

    it('supports cause', () => {
        const cause = new Error('EACCES')
        const error = new StorageError('wrapped', { cause })
        expect(error.cause).toBe(cause)
    })

    it('recognises its own errors only', () => {
        expect(isStudyWeekError(new ValidationError('x'))).toBe(true)
        expect(isStudyWeekError(new Error('x'))).toBe(false)
        expect(isStudyWeekError('x')).toBe(false)
    })
})

describe('errorMessage', () => {
    it('uses the message of Error instances', () => {
        expect(errorMessage(new ConfigError('Availability rule Mon 20:00-18:00 must end after it starts'))).toBe(
            'Availability rule Mon 20:00-18:00 must end after it starts'
        )
    })

    it('stringifies anything else', () => {
        expect(errorMessage('plain')).toBe('plain')
        expect(errorMessage(42)).toBe('42')
    })
})
