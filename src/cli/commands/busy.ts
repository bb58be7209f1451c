import * as clack from '@clack/prompts'
import { parseIcs } from '../../calendar/ics.js'
import type { Container } from '../../core/container.js'
import { formatDuration, formatStamp } from '../../core/time.js'
import { timeZoneArg } from '../args.js'
import { colors } from '../ui.js'

/**
 * Replaces the stored busy snapshot with the events of an .ics file. Zoned
 * and UTC events land on the wall clock of `options.tz` (default: host zone).
 */
export async function busyImportCommand(container: Container, file: string, options: { tz?: string } = {}): Promise<void> {
    const timeZone = timeZoneArg(options.tz)
    const text = await container.fs.readText(file)
    const busy = parseIcs(text, { timeZone })
    const session = await container.openProfile()
    session.busy = busy
    await session.save()
    container.logger.debug({ file, timeZone, events: busy.length }, 'Calendar snapshot imported')
    console.log(`${colors.success('Imported')} ${busy.length} busy interval(s) from ${file}`)
}

export async function busyListCommand(container: Container): Promise<void> {
    const { busy } = await container.openProfile()
    if (busy.length === 0) {
        console.log(colors.dim('No busy time imported.'))
        return
    }
    for (const b of busy) {
        const span = `${formatStamp(b.start, 'YYYY-MM-DD HH:mm')} - ${formatStamp(b.end, 'YYYY-MM-DD HH:mm')}`
        console.log(`${span}  ${b.title ?? ''} ${colors.dim(`(${formatDuration((b.end - b.start) / 60_000)})`)}`)
    }
}

export async function busyClearCommand(container: Container, options: { yes?: boolean }): Promise<void> {
    const session = await container.openProfile()
    if (session.busy.length === 0) {
        console.log(colors.dim('Nothing to clear.'))
        return
    }
    if (!options.yes) {
        const answer = await clack.confirm({ message: `Remove ${session.busy.length} imported busy interval(s)?` })
        if (clack.isCancel(answer) || !answer) {
            console.log(colors.dim('Cancelled.'))
            return
        }
    }
    session.busy = []
    await session.save()
    console.log(colors.success('Busy time cleared.'))
}
