import type { Container } from '../../core/container.js'
import { progressReport } from '../../planner/progress.js'
import { colors, formatProgress } from '../ui.js'

export async function progressCommand(container: Container): Promise<void> {
    const { model } = await container.openProfile()
    const subjects = model.subjects()
    if (subjects.length === 0) {
        console.log(colors.dim('No subjects yet. Add one with: studyweek subject add <name>'))
        return
    }

    const report = progressReport(subjects, model.tasks())
    console.log(`${colors.bold('Overall')}  ${formatProgress(report.overall)}`)
    for (const subject of report.subjects) {
        console.log(`${subject.name}  ${formatProgress(subject)}`)
    }
}
