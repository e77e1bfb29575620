/**
 * Driver configuration
 *
 * Loading reads a YAML file (with ${VAR} interpolation) and validates it.
 * Resolution then fills every environment-dependent default exactly once,
 * producing a frozen snapshot the components share for the whole run.
 */

import { readFileSync } from 'node:fs'
import { homedir, hostname as osHostname, tmpdir } from 'node:os'
import { isAbsolute, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { type DriverConfig, safeParseDriverConfig } from '@zonekit/core'
import { parse as parseYaml } from 'yaml'
import { ConfigValidationError } from './errors'

export function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue
}

/** Templates shipped with the driver */
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../templates', import.meta.url))

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the variable exists in env
 */
export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => env[varName] ?? match)
}

/**
 * Validate raw configuration data
 * @param source Where the data came from, for error messages
 */
export function parseDriverConfig(data: unknown, source: string): DriverConfig {
  const result = safeParseDriverConfig(data ?? {})
  if (!result.success) {
    throw new ConfigValidationError(source, result.errors)
  }
  return result.data
}

/**
 * Load and validate a configuration YAML file
 * @param overrides snake_case keys applied over the file contents
 */
export function loadConfigFile(
  filePath: string,
  overrides: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): DriverConfig {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return parseDriverConfig(overrides, `${filePath} (not found) and command-line options`)
    }
    throw error
  }

  const raw: unknown = parseYaml(interpolateEnvVars(content, env)) ?? {}
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigValidationError(filePath, [{ path: '/', message: 'Expected a mapping' }])
  }
  return parseDriverConfig({ ...raw, ...overrides }, filePath)
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Everything ambient a run depends on, captured once.
 */
export interface ResolutionContext {
  /** Label the zone name is derived from */
  instanceName: string
  cwd: string
  homeDir: string
  /** Login name of the invoking user */
  login: string
  hostname: string
  /** Local directory for rendered artifacts */
  tmpDir: string
  now: Date
}

/**
 * Configuration snapshot for one run. Every environment-dependent default
 * is filled in; nothing downstream reads the process environment.
 */
export type ResolvedDriverConfig = Readonly<
  Omit<DriverConfig, 'sshPublicKey' | 'sshPrivateKey' | 'zoneComment' | 'transportHost' | 'templatesDir'> & {
    instanceName: string
    sshPublicKey: string
    sshPrivateKey: string
    zoneComment: string
    transportHost: string
    templatesDir: string
    /** Comment on the generated public key line */
    sshKeyComment: string
    localStagingDir: string
  }
>

/**
 * Capture the ambient context from the current process.
 */
export function captureResolutionContext(instanceName: string): ResolutionContext {
  return {
    instanceName,
    cwd: process.cwd(),
    homeDir: homedir(),
    login: process.env.LOGNAME ?? process.env.USER ?? 'unknown',
    hostname: osHostname(),
    tmpDir: tmpdir(),
    now: new Date(),
  }
}

function expandPath(path: string, context: ResolutionContext): string {
  if (path === '~') return context.homeDir
  if (path.startsWith('~/')) return join(context.homeDir, path.slice(2))
  return isAbsolute(path) ? path : resolve(context.cwd, path)
}

/**
 * Fill environment-dependent defaults and freeze the result.
 */
export function resolveDriverConfig(
  config: DriverConfig,
  context: ResolutionContext,
): ResolvedDriverConfig {
  const keyDir = join(context.cwd, `.${config.kitchenUserName}`)

  return Object.freeze({
    ...config,
    instanceName: context.instanceName,
    globalZonePrivateKey:
      config.globalZonePrivateKey === undefined
        ? undefined
        : expandPath(config.globalZonePrivateKey, context),
    sshPublicKey: expandPath(config.sshPublicKey ?? join(keyDir, 'id_rsa.pub'), context),
    sshPrivateKey: expandPath(config.sshPrivateKey ?? join(keyDir, 'id_rsa'), context),
    zoneComment:
      config.zoneComment ??
      `Zone created by ${context.login} on ${context.hostname} at ${context.now.toISOString()}`,
    transportHost: config.transportHost ?? config.globalZoneHost,
    templatesDir: config.templatesDir
      ? expandPath(config.templatesDir, context)
      : BUNDLED_TEMPLATES_DIR,
    sshKeyComment: `${config.kitchenUserName}@${context.hostname}`,
    localStagingDir: context.tmpDir,
  })
}
