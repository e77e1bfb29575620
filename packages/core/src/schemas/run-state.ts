import { z } from 'zod'
import { snakeToCamelDeep } from '../case-convert'
import { ZONE_PHASES, type RunState, type ZonePhase } from '../types'
import { type ParseResult, toValidationErrors } from './driver-config'

const zonePhase = z
  .string()
  .refine((value): value is ZonePhase => ZONE_PHASES.some((phase) => phase === value), {
    message: `Must be one of: ${ZONE_PHASES.join(', ')}`,
  })

const port = z.number().int().min(1).max(65535)

/**
 * Persisted run state schema (snake_case, as stored in state files)
 */
export const runStateSchema = z.object({
  phase: zonePhase.optional(),
  zone_name: z.string().min(1).optional(),
  zone_ip: z.string().ip({ version: 'v4' }).optional(),
  zone_port: port.optional(),
  hostname: z.string().min(1).optional(),
  port: port.optional(),
  username: z.string().min(1).optional(),
})

/**
 * Safely parse a persisted run state (returns camelCase)
 */
export function safeParseRunState(data: unknown): ParseResult<RunState> {
  const result = runStateSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: snakeToCamelDeep(result.data) }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}
