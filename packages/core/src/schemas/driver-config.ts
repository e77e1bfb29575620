import { z } from 'zod'
import { type CamelCasedPropertiesDeep, snakeToCamelDeep } from '../case-convert'

/**
 * Parse duration string (e.g., "30s", "5m", "1000ms") to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)(ms|s|m|h)$/)
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`)
  }
  const value = Number.parseInt(match[1], 10)
  switch (match[2]) {
    case 'ms':
      return value
    case 's':
      return value * 1000
    case 'm':
      return value * 60 * 1000
    default:
      return value * 60 * 60 * 1000
  }
}

/**
 * Format milliseconds to duration string
 */
export function formatDuration(ms: number): string {
  if (ms > 0 && ms % (60 * 60 * 1000) === 0) return `${ms / (60 * 60 * 1000)}h`
  if (ms > 0 && ms % (60 * 1000) === 0) return `${ms / (60 * 1000)}m`
  if (ms > 0 && ms % 1000 === 0) return `${ms / 1000}s`
  return `${ms}ms`
}

// Duration string pattern (e.g., "30s", "5m", "1000ms", "1h")
const durationPattern = /^[0-9]+(ms|s|m|h)$/
const duration = z.union([
  z.number().int().min(0),
  z
    .string()
    .regex(durationPattern, 'Must be a duration string (e.g., "30s", "5m", "1000ms")')
    .transform(parseDuration),
])

const nonEmpty = z.string().trim().min(1, 'Must not be empty')

/** Ports the forwarding rule may use (unprivileged range) */
export const FORWARD_PORT_MIN = 1025
export const FORWARD_PORT_MAX = 65535

// =============================================================================
// Driver Configuration
// =============================================================================

/**
 * Driver configuration schema.
 *
 * Keys are snake_case as they appear in the configuration file. Values whose
 * defaults depend on the invoking environment (key paths, zone comment,
 * transport host) stay optional here and are filled in by config resolution.
 */
export const driverConfigSchema = z.object({
  // Global zone (administrative) connection
  global_zone_host: nonEmpty.describe('Host that runs the zone toolchain'),
  global_zone_username: nonEmpty.default('root').describe('Administrative login on the host'),
  global_zone_port: z.number().int().min(1).max(65535).default(22).describe('SSH port on the host'),
  global_zone_private_key: nonEmpty
    .optional()
    .describe('Key file for the administrative session (falls back to the SSH agent)'),

  // Account and credential pair used inside the zone
  kitchen_user_name: z
    .string()
    .regex(/^[a-z_][a-z0-9_-]*$/, 'Must be a valid login name')
    .default('kitchen')
    .describe('Account created inside the zone'),
  ssh_public_key: nonEmpty.optional().describe('Path of the public half of the credential pair'),
  ssh_private_key: nonEmpty.optional().describe('Path of the private half of the credential pair'),
  ssh_key_bits: z.number().int().min(1024).max(16384).default(2048).describe('RSA key size'),

  // Rendered artifacts
  zone_comment: z.string().optional().describe('Free-text comment stored on the zone'),
  zone_lower_link: nonEmpty
    .default('kitchenstub0')
    .describe('Stub link with a DHCP server the zone NIC sits on'),
  zone_name: nonEmpty.optional().describe('Explicit zone name (generated when unset)'),
  zone_path_root: nonEmpty.default('/systems/zones/').describe('Directory zones are created under'),
  zone_template: nonEmpty.default('kitchen-template').describe('Template zone to clone'),
  templates_dir: nonEmpty.optional().describe('Directory with zone.cfg.tmpl and profile.xml.tmpl'),

  // Networking
  zone_port: z
    .number()
    .int()
    .min(FORWARD_PORT_MIN)
    .max(FORWARD_PORT_MAX)
    .optional()
    .describe('Forwarded port on the host (selected when unset)'),
  zone_interface: nonEmpty.default('net0').describe('Zone NIC polled for an address'),
  zone_service_port: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(22)
    .describe('Port inside the zone the NAT rule targets'),
  transport_host: nonEmpty.optional().describe('Host reported to the caller for test traffic'),
  network_poll_interval: duration.default(5000).describe('Pause before each address probe'),
  network_max_attempts: z
    .number()
    .int()
    .min(1)
    .default(60)
    .describe('Address probes before giving up'),
  create_timeout: duration.optional().describe('Deadline for the whole create'),

  // Debugging
  keep_config: z.boolean().default(false).describe('Keep staged artifacts locally and remotely'),
})

/** Driver configuration as written (snake_case, defaults applied) */
export type DriverConfigRaw = z.output<typeof driverConfigSchema>

/** Driver configuration as used in code (camelCase) */
export type DriverConfig = CamelCasedPropertiesDeep<DriverConfigRaw>

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Map zod issues to path/message pairs
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
}

/**
 * Safely parse driver configuration, returning result with errors (returns camelCase)
 */
export function safeParseDriverConfig(data: unknown): ParseResult<DriverConfig> {
  const result = driverConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: snakeToCamelDeep(result.data) }
  }
  return { success: false, errors: toValidationErrors(result.error) }
}
