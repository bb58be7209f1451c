import * as clack from '@clack/prompts'
import type { Container } from '../../core/container.js'
import { colors } from '../ui.js'

export async function profileListCommand(container: Container): Promise<void> {
    const profiles = await container.store.list()
    for (const name of profiles) {
        const marker = name === container.config.profile ? colors.success('*') : ' '
        console.log(`${marker} ${name}`)
    }
}

export async function profileCreateCommand(container: Container, name: string): Promise<void> {
    await container.store.create(name)
    console.log(`${colors.success('Created profile')} ${name.trim()}`)
}

export async function profileDeleteCommand(container: Container, name: string, options: { yes?: boolean }): Promise<void> {
    if (!options.yes) {
        const answer = await clack.confirm({ message: `Delete profile "${name}" and all of its subjects and tasks?` })
        if (clack.isCancel(answer) || !answer) {
            console.log(colors.dim('Cancelled.'))
            return
        }
    }
    await container.store.delete(name)
    console.log(`${colors.success('Deleted profile')} ${name}`)
}
