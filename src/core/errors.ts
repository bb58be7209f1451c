export type ErrorCode = 'config' | 'validation' | 'storage'

export class StudyWeekError extends Error {
    readonly code: ErrorCode

    constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
        super(message, options)
        this.name = 'StudyWeekError'
        this.code = code
    }
}

/** Malformed availability rule or rule set, or an unusable setting. */
export class ConfigError extends StudyWeekError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', options)
        this.name = 'ConfigError'
    }
}

/** Rejected mutation or authoring request. The model is left untouched. */
export class ValidationError extends StudyWeekError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'validation', options)
        this.name = 'ValidationError'
    }
}

export class StorageError extends StudyWeekError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'storage', options)
        this.name = 'StorageError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isStudyWeekError(error: unknown): error is StudyWeekError {
    return error instanceof StudyWeekError
}
