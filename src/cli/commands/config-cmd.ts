import type { Container } from '../../core/container.js'
import { colors } from '../ui.js'

export async function configCommand(container: Container, key?: string): Promise<void> {
    const config = container.config
    if (!key) {
        console.log(JSON.stringify(config, null, 2))
        return
    }

    // dotted paths reach into nested sections, e.g. planner.nearTermDays
    let value: unknown = config
    for (const part of key.split('.')) {
        value = typeof value === 'object' && value !== null ? Object.entries(value).find(([k]) => k === part)?.[1] : undefined
    }
    if (value !== undefined) {
        console.log(`${key}: ${JSON.stringify(value)}`)
    } else {
        console.log(colors.warn(`Config key '${key}' not found`))
    }
}
