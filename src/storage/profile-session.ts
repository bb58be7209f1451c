import type { TypedEventEmitter } from '../core/events.js'
import type { AvailabilityRule, BusyInterval } from '../core/types.js'
import { TaskModel } from '../model/task-model.js'
import { ProgressTracker } from '../planner/progress.js'
import type { ProfileStore } from './profile-store.js'
import type { PlannerState } from './schema.js'

/** A loaded profile: the task model plus the week inputs stored beside it. */
export interface ProfileSession {
    readonly name: string
    readonly model: TaskModel
    readonly tracker: ProgressTracker
    rules: AvailabilityRule[]
    busy: BusyInterval[]
    lastPlannedAt?: number
    save(): Promise<void>
}

export function toState(session: Omit<ProfileSession, 'save' | 'tracker' | 'name'>): PlannerState {
    return {
        version: 1,
        subjects: session.model.toSnapshot().subjects,
        rules: [...session.rules],
        busy: [...session.busy],
        ...(session.lastPlannedAt !== undefined ? { lastPlannedAt: session.lastPlannedAt } : {}),
    }
}

export async function openProfile(
    store: ProfileStore,
    name: string,
    options: { events?: TypedEventEmitter; clock?: () => number } = {}
): Promise<ProfileSession> {
    const state = await store.load(name)
    const model = TaskModel.fromSnapshot({ subjects: state.subjects })
    const session: ProfileSession = {
        name,
        model,
        tracker: new ProgressTracker(model, options),
        rules: state.rules,
        busy: state.busy,
        lastPlannedAt: state.lastPlannedAt,
        async save() {
            await store.save(name, toState(session))
        },
    }
    return session
}
