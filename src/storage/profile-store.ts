import path from 'node:path'
import { errorMessage, StorageError, ValidationError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { DEFAULT_PROFILE } from '../config/defaults.js'
import { emptyState, type PlannerState, PlannerStateSchema, ProfileIndexSchema } from './schema.js'

const INDEX_FILE = 'profiles.json'
const PROFILE_PREFIX = 'state__'
const PROFILE_SUFFIX = '.json'
const MAX_NAME_LENGTH = 80

/** Keeps `[A-Za-z0-9_-]`, collapses anything else into `_`. */
export function sanitizeProfileName(name: string): string {
    const safe = name
        .trim()
        .replace(/[^A-Za-z0-9_-]+/g, '_')
        .replace(/^_+|_+$/g, '')
    return (safe || DEFAULT_PROFILE).slice(0, MAX_NAME_LENGTH)
}

/**
 * Named planner profiles, one JSON file each, plus an index of names.
 * Writes go through a temp file and a rename.
 */
export class ProfileStore {
    constructor(
        private readonly fs: FileSystem,
        private readonly dataDir: string,
        private readonly logger: Logger
    ) {}

    profilePath(name: string): string {
        return path.join(this.dataDir, `${PROFILE_PREFIX}${sanitizeProfileName(name)}${PROFILE_SUFFIX}`)
    }

    private get indexPath(): string {
        return path.join(this.dataDir, INDEX_FILE)
    }

    async list(): Promise<string[]> {
        const indexed = await this.readIndex()
        const discovered = (await this.fs.list(this.dataDir))
            .filter((f) => f.startsWith(PROFILE_PREFIX) && f.endsWith(PROFILE_SUFFIX))
            .map((f) => f.slice(PROFILE_PREFIX.length, -PROFILE_SUFFIX.length))

        const combined: string[] = []
        for (const name of [...indexed, ...discovered]) {
            if (name && !combined.some((c) => sanitizeProfileName(c) === sanitizeProfileName(name))) combined.push(name)
        }
        if (combined.length === 0) {
            combined.push(DEFAULT_PROFILE)
            await this.writeIndex(combined)
        }
        return combined
    }

    async load(name: string): Promise<PlannerState> {
        const filePath = this.profilePath(name)
        if (!(await this.fs.exists(filePath))) {
            await this.remember(name)
            return emptyState()
        }

        const raw = await this.fs.readText(filePath)
        const parsed = this.parseState(raw)
        if (parsed) {
            await this.remember(name)
            return parsed
        }

        this.logger.warn({ profile: name, backup: `${filePath}.bak` }, 'Profile file unreadable, starting from an empty state')
        await this.fs.writeText(`${filePath}.bak`, raw)
        const state = emptyState()
        await this.save(name, state)
        return state
    }

    async save(name: string, state: PlannerState): Promise<void> {
        const filePath = this.profilePath(name)
        const temp = `${filePath}.tmp`
        try {
            await this.fs.mkdir(this.dataDir)
            await this.fs.writeJSON(temp, state)
            await this.fs.rename(temp, filePath)
        } catch (error) {
            throw new StorageError(`Could not save profile "${name}": ${errorMessage(error)}`, { cause: error })
        }
        this.logger.debug({ profile: name, file: filePath }, 'Profile saved')
        await this.remember(name)
    }

    async create(name: string): Promise<PlannerState> {
        const trimmed = name.trim()
        if (!trimmed) throw new ValidationError('Profile name cannot be empty')

        const profiles = await this.list()
        if (profiles.some((p) => p.toLowerCase() === trimmed.toLowerCase())) {
            throw new ValidationError(`Profile "${trimmed}" already exists`)
        }
        if (await this.fs.exists(this.profilePath(trimmed))) {
            throw new ValidationError(`A profile file for "${trimmed}" already exists on disk`)
        }

        const state = emptyState()
        await this.save(trimmed, state)
        return state
    }

    async delete(name: string): Promise<void> {
        await this.fs.remove(this.profilePath(name))
        const remaining = (await this.list()).filter((p) => sanitizeProfileName(p) !== sanitizeProfileName(name))
        if (remaining.length === 0) {
            await this.save(DEFAULT_PROFILE, emptyState())
            remaining.push(DEFAULT_PROFILE)
        }
        await this.writeIndex(remaining)
        this.logger.debug({ profile: name }, 'Profile deleted')
    }

    private parseState(raw: string): PlannerState | null {
        if (!raw.trim()) return null
        try {
            const result = PlannerStateSchema.safeParse(JSON.parse(raw))
            return result.success ? result.data : null
        } catch {
            return null
        }
    }

    private async readIndex(): Promise<string[]> {
        if (!(await this.fs.exists(this.indexPath))) return []
        try {
            const result = ProfileIndexSchema.safeParse(await this.fs.readJSON<unknown>(this.indexPath))
            if (result.success) return result.data.profiles
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'Profile index unreadable, rebuilding from disk')
        }
        return []
    }

    private async writeIndex(profiles: string[]): Promise<void> {
        await this.fs.mkdir(this.dataDir)
        await this.fs.writeJSON(this.indexPath, { profiles })
    }

    private async remember(name: string): Promise<void> {
        const indexed = await this.readIndex()
        if (indexed.includes(name)) return
        await this.writeIndex([...indexed, name])
    }
}
