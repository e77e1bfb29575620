/**
 * Domain Error Types
 *
 * Each error carries a stable `code` so callers (the CLI, a harness plugin)
 * can branch on the kind of failure without matching messages.
 */

import { type ExecResult, type ValidationError, formatDuration } from '@zonekit/core'

export class ConfigValidationError extends Error {
  readonly code = 'CONFIG_INVALID'

  constructor(
    public readonly source: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid configuration in ${source}:\n${errorList}`)
    this.name = 'ConfigValidationError'
  }
}

export class ZoneNameError extends Error {
  readonly code = 'ZONE_NAME_INVALID'

  constructor(
    public readonly zoneName: string,
    reason: string,
  ) {
    super(`Invalid zone name "${zoneName}": ${reason}`)
    this.name = 'ZoneNameError'
  }
}

export class ArtifactValidationError extends Error {
  readonly code = 'ARTIFACT_INVALID'

  constructor(
    public readonly artifact: string,
    public readonly field: string,
    reason: string,
  ) {
    super(`Cannot render ${artifact}: ${field} ${reason}`)
    this.name = 'ArtifactValidationError'
  }
}

export class RemoteCommandError extends Error {
  readonly code = 'REMOTE_COMMAND_FAILED'

  constructor(
    public readonly command: readonly string[],
    public readonly result: ExecResult,
  ) {
    const stderr = result.stderr.trim()
    super(
      `Remote command failed (exit ${result.exitCode}): ${command.join(' ')}${stderr ? `: ${stderr.slice(0, 500)}` : ''}`,
    )
    this.name = 'RemoteCommandError'
  }
}

export class NetworkTimeoutError extends Error {
  readonly code = 'NETWORK_TIMEOUT'

  constructor(
    public readonly zoneName: string,
    public readonly attempts: number,
    public readonly waitedMs: number,
  ) {
    super(
      `Zone ${zoneName} did not obtain an address after ${attempts} attempts (${formatDuration(waitedMs)})`,
    )
    this.name = 'NetworkTimeoutError'
  }
}

export class PortSelectionError extends Error {
  readonly code = 'PORT_UNAVAILABLE'

  constructor(tries: number) {
    super(`No free forwarding port found after ${tries} tries`)
    this.name = 'PortSelectionError'
  }
}

export class StateFileError extends Error {
  readonly code = 'STATE_INVALID'

  constructor(
    public readonly file: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid state file ${file}:\n${errorList}`)
    this.name = 'StateFileError'
  }
}

export type DriverError =
  | ConfigValidationError
  | ZoneNameError
  | ArtifactValidationError
  | RemoteCommandError
  | NetworkTimeoutError
  | PortSelectionError
  | StateFileError

/**
 * Type guard for domain errors with a stable code.
 */
export function isDriverError(err: unknown): err is DriverError {
  return (
    err instanceof ConfigValidationError ||
    err instanceof ZoneNameError ||
    err instanceof ArtifactValidationError ||
    err instanceof RemoteCommandError ||
    err instanceof NetworkTimeoutError ||
    err instanceof PortSelectionError ||
    err instanceof StateFileError
  )
}
