import { z } from 'zod'

export const StepDisplaySchema = z.enum(['full', 'tool_calls', 'hidden'])

export type StepDisplay = z.infer<typeof StepDisplaySchema>

export const ConfigSchema = z.object({
    logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
    maxSessions: z.number().int().positive().optional(),
    persistence: z
        .object({
            enabled: z.boolean().optional(),
        })
        .optional(),
    chatContext: z
        .object({
            excludeRemovedActionMessages: z.boolean().optional(),
        })
        .optional(),
    steps: z
        .object({
            display: StepDisplaySchema.optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    logLevel: 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'
    maxSessions: number
    persistence: { enabled: boolean }
    chatContext: { excludeRemovedActionMessages: boolean }
    steps: { display: StepDisplay }
    projectDir: string
    configDir: string
}
