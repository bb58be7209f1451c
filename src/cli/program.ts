import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import { type Container, type ContainerOverrides, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { type FileSystem, NodeFileSystem } from '../core/fs.js'
import { busyClearCommand, busyImportCommand, busyListCommand } from './commands/busy.js'
import { configCommand } from './commands/config-cmd.js'
import { planCommand } from './commands/plan.js'
import { profileCreateCommand, profileDeleteCommand, profileListCommand } from './commands/profile.js'
import { progressCommand } from './commands/progress.js'
import { riskCommand } from './commands/risk.js'
import { ruleAddCommand, ruleListCommand, ruleRemoveCommand } from './commands/rule.js'
import { subjectAddCommand, subjectListCommand, subjectRemoveCommand } from './commands/subject.js'
import {
    taskAddCommand,
    taskDoneCommand,
    taskEffortCommand,
    taskListCommand,
    taskLogCommand,
    taskRemoveCommand,
    taskUndoneCommand,
} from './commands/task.js'
import { formatError } from './ui.js'

type GlobalOptions = {
    profile?: string
    dataDir?: string
    debug?: boolean
}

export async function buildContainer(options: GlobalOptions, overrides: ContainerOverrides = {}): Promise<Container> {
    const fs: FileSystem = overrides.fs ?? new NodeFileSystem()
    const skipped: Array<{ file: string; reason: string }> = []
    const config = await loadConfig({
        fs,
        cliFlags: {
            profile: options.profile,
            dataDir: options.dataDir,
            logLevel: options.debug ? 'debug' : undefined,
        },
        onInvalid: (file, reason) => skipped.push({ file, reason }),
    })
    const container = createContainer(config, { ...overrides, fs })
    for (const { file, reason } of skipped) {
        container.logger.warn({ file, reason }, 'Ignoring invalid config file')
    }
    return container
}

type Handler = (container: Container) => Promise<void>

/**
 * Wraps a command body: builds the container from the global flags, reports
 * failures as a single error line and exits non-zero.
 */
async function run(command: Command, handler: Handler, overrides?: ContainerOverrides): Promise<void> {
    let container: Container | undefined
    try {
        container = await buildContainer(command.optsWithGlobals<GlobalOptions>(), overrides)
        await handler(container)
    } catch (error) {
        container?.logger.debug({ err: error }, 'Command failed')
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    } finally {
        container?.shutdown()
    }
}

export function createProgram(overrides?: ContainerOverrides): Command {
    const program = new Command()

    program
        .name('studyweek')
        .description('Plan weekly study sessions and track deadline risk')
        .version('0.1.0')
        .option('--profile <name>', 'Profile to use')
        .option('--data-dir <dir>', 'Directory holding profile files')
        .option('--debug', 'Enable debug logging')

    const subject = program.command('subject').description('Manage subjects')
    subject
        .command('add <name>')
        .description('Add a subject')
        .option('-t, --target <duration>', 'Weekly target effort, e.g. 4h')
        .action((name: string, options: { target?: string }, cmd: Command) =>
            run(cmd, (c) => subjectAddCommand(c, name, options), overrides)
        )
    subject
        .command('list')
        .description('List subjects')
        .action((_options: unknown, cmd: Command) => run(cmd, (c) => subjectListCommand(c), overrides))
    subject
        .command('remove <id>')
        .description('Remove a subject and its tasks')
        .action((id: string, _options: unknown, cmd: Command) => run(cmd, (c) => subjectRemoveCommand(c, id), overrides))

    const task = program.command('task').description('Manage tasks and progress')
    task.command('add <subjectId> <title>')
        .description('Add a task to a subject')
        .requiredOption('-e, --effort <duration>', 'Estimated effort, e.g. 90m or 2h')
        .option('-d, --deadline <date>', 'Deadline (YYYY-MM-DD)')
        .option('-p, --priority <level>', 'low, medium or high', 'medium')
        .option('-n, --notes <text>', 'Free-form notes')
        .action(
            (
                subjectId: string,
                title: string,
                options: { effort: string; deadline?: string; priority?: string; notes?: string },
                cmd: Command
            ) => run(cmd, (c) => taskAddCommand(c, subjectId, title, options), overrides)
        )
    task.command('list')
        .description('List tasks')
        .action((_options: unknown, cmd: Command) => run(cmd, (c) => taskListCommand(c), overrides))
    task.command('remove <id>')
        .description('Remove a task')
        .action((id: string, _options: unknown, cmd: Command) => run(cmd, (c) => taskRemoveCommand(c, id), overrides))
    task.command('done <id>')
        .description('Mark a task done')
        .action((id: string, _options: unknown, cmd: Command) => run(cmd, (c) => taskDoneCommand(c, id), overrides))
    task.command('undone <id>')
        .description('Reopen a done task with its previous remaining effort')
        .action((id: string, _options: unknown, cmd: Command) => run(cmd, (c) => taskUndoneCommand(c, id), overrides))
    task.command('effort <id> <remaining>')
        .description('Correct the remaining effort of a task')
        .action((id: string, remaining: string, _options: unknown, cmd: Command) =>
            run(cmd, (c) => taskEffortCommand(c, id, remaining), overrides)
        )
    task.command('log <id> <worked>')
        .description('Subtract time worked from a task')
        .action((id: string, worked: string, _options: unknown, cmd: Command) =>
            run(cmd, (c) => taskLogCommand(c, id, worked), overrides)
        )

    const rule = program.command('rule').description('Manage weekly availability')
    rule.command('add <weekday> <start> <end>')
        .description('Add a recurring free window, e.g. "mon 18:00 20:00"')
        .action((weekday: string, start: string, end: string, _options: unknown, cmd: Command) =>
            run(cmd, (c) => ruleAddCommand(c, weekday, start, end), overrides)
        )
    rule.command('list')
        .description('List availability rules')
        .action((_options: unknown, cmd: Command) => run(cmd, (c) => ruleListCommand(c), overrides))
    rule.command('remove <index>')
        .description('Remove a rule by its list position')
        .action((index: string, _options: unknown, cmd: Command) => run(cmd, (c) => ruleRemoveCommand(c, index), overrides))

    const busy = program.command('busy').description('Manage imported busy time')
    busy.command('import <file>')
        .description('Replace busy time with the events of an .ics file')
        .option('--tz <zone>', 'Time zone to read zoned events in (default: this machine\'s)')
        .action((file: string, options: { tz?: string }, cmd: Command) =>
            run(cmd, (c) => busyImportCommand(c, file, options), overrides)
        )
    busy.command('list')
        .description('List imported busy intervals')
        .action((_options: unknown, cmd: Command) => run(cmd, (c) => busyListCommand(c), overrides))
    busy.command('clear')
        .description('Remove all imported busy time')
        .option('-y, --yes', 'Do not ask for confirmation')
        .action((options: { yes?: boolean }, cmd: Command) => run(cmd, (c) => busyClearCommand(c, options), overrides))

    program
        .command('plan')
        .description('Generate the weekly schedule')
        .option('-w, --week <date>', 'Any date in the week to plan (default: this week)')
        .option('--today <date>', 'Override today (YYYY-MM-DD)')
        .option('--ics <file>', 'Also write the sessions to an .ics file')
        .action((options: { week?: string; today?: string; ics?: string }, cmd: Command) =>
            run(cmd, (c) => planCommand(c, options), overrides)
        )

    program
        .command('risk')
        .description('Show pending tasks by risk of missing their deadline')
        .option('-w, --week <date>', 'Any date in the week to plan (default: this week)')
        .option('--today <date>', 'Override today (YYYY-MM-DD)')
        .action((options: { week?: string; today?: string }, cmd: Command) =>
            run(cmd, (c) => riskCommand(c, options), overrides)
        )

    program
        .command('progress')
        .description('Show completed and remaining effort per subject')
        .action((_options: unknown, cmd: Command) => run(cmd, (c) => progressCommand(c), overrides))

    const profile = program.command('profile').description('Manage planner profiles')
    profile
        .command('list')
        .description('List profiles')
        .action((_options: unknown, cmd: Command) => run(cmd, (c) => profileListCommand(c), overrides))
    profile
        .command('create <name>')
        .description('Create an empty profile')
        .action((name: string, _options: unknown, cmd: Command) => run(cmd, (c) => profileCreateCommand(c, name), overrides))
    profile
        .command('delete <name>')
        .description('Delete a profile')
        .option('-y, --yes', 'Do not ask for confirmation')
        .action((name: string, options: { yes?: boolean }, cmd: Command) =>
            run(cmd, (c) => profileDeleteCommand(c, name, options), overrides)
        )

    program
        .command('config [key]')
        .description('Show the resolved configuration')
        .action((key: string | undefined, _options: unknown, cmd: Command) =>
            run(cmd, (c) => configCommand(c, key), overrides)
        )

    return program
}
