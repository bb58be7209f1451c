import pino from 'pino'
import type { LogLevel, ResolvedConfig } from '../config/schema.js'
import type { EventMap, TypedEventEmitter } from '../core/events.js'

export type Logger = pino.Logger

const QUIET_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error']

/** CLI output goes to stdout; the log only surfaces warnings unless debugging. */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const debug = config.logLevel === 'debug' || config.logLevel === 'trace'
    return pino({
        name: 'studyweek',
        level: debug || QUIET_LEVELS.includes(config.logLevel) ? config.logLevel : 'warn',
        transport: debug ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } } : undefined,
    })
}

/** Mirrors progress and planning events into the log. Returns an unsubscribe function. */
export function logPlannerEvents(eventBus: TypedEventEmitter, logger: Logger): () => void {
    const onDone = ({ task, previousRemaining }: EventMap['task:done']) =>
        logger.debug({ taskId: task.id, previousRemaining }, 'Task marked done')
    const onUndone = ({ task }: EventMap['task:undone']) =>
        logger.debug({ taskId: task.id, remaining: task.remainingMinutes }, 'Task marked undone')
    const onEffort = ({ task, previousRemaining }: EventMap['task:effort']) =>
        logger.debug({ taskId: task.id, previousRemaining, remaining: task.remainingMinutes }, 'Task effort changed')
    const onPlan = (data: EventMap['plan:generated']) => logger.debug(data, 'Weekly plan generated')

    eventBus.on('task:done', onDone)
    eventBus.on('task:undone', onUndone)
    eventBus.on('task:effort', onEffort)
    eventBus.on('plan:generated', onPlan)

    return () => {
        eventBus.off('task:done', onDone)
        eventBus.off('task:undone', onUndone)
        eventBus.off('task:effort', onEffort)
        eventBus.off('plan:generated', onPlan)
    }
}
