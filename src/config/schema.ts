import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const PlannerSettingsSchema = z.object({
    nearTermDays: z.number().int().min(0).max(60).optional(),
    dailyCapacityMinutes: z.union([z.number().positive().max(1440), z.literal('auto')]).optional(),
    minSessionMinutes: z.number().min(0).max(240).optional(),
    maxSessionMinutes: z.number().positive().max(1440).optional(),
})

export const ConfigSchema = z.object({
    logLevel: LogLevelSchema.optional(),
    dataDir: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    planner: PlannerSettingsSchema.optional(),
})

export type Config = z.infer<typeof ConfigSchema>
export type LogLevel = z.infer<typeof LogLevelSchema>

export interface PlannerSettings {
    nearTermDays: number
    dailyCapacityMinutes: number | 'auto'
    minSessionMinutes: number
    maxSessionMinutes?: number
}

export interface ResolvedConfig {
    logLevel: LogLevel
    dataDir: string
    profile: string
    planner: PlannerSettings
    projectDir: string
    configDir: string
}
