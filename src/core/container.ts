import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger, logPlannerEvents } from '../logger/index.js'
import { ProfileStore } from '../storage/profile-store.js'
import { openProfile, type ProfileSession } from '../storage/profile-session.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    store: ProfileStore
    clock: () => number
    /** Loads the configured profile (or `name`) with a tracker wired to the event bus. */
    openProfile(name?: string): Promise<ProfileSession>
    shutdown(): void
}

export interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    clock?: () => number
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const clock = overrides.clock ?? Date.now
    const store = new ProfileStore(fs, config.dataDir, logger)
    const stopEventLog = logPlannerEvents(eventBus, logger)

    return {
        config,
        logger,
        eventBus,
        fs,
        store,
        clock,

        async openProfile(name = config.profile) {
            logger.debug({ profile: name, dataDir: config.dataDir }, 'Opening profile')
            return openProfile(store, name, { events: eventBus, clock })
        },

        shutdown() {
            stopEventLog()
            eventBus.removeAll()
        },
    }
}
