/**
 * Run state persistence
 *
 * One YAML file per instance under the state directory. A zone created by
 * one invocation is destroyed by a later one, so this file is the only link
 * between them.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { type RunState, camelToSnakeDeep, safeParseRunState } from '@zonekit/core'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { StateFileError } from '../errors'
import type { Logger } from '../logger'

const INSTANCE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/

export interface StateStoreOptions {
  /**
   * @example '/work/project/.zonekit'
   */
  dir: string
  logger?: Logger
}

/**
 * True when the state still points at something on the host.
 */
export function holdsRemoteResources(state: RunState): boolean {
  return state.zoneName !== undefined || state.zoneIp !== undefined || state.zonePort !== undefined
}

export class StateStore {
  readonly dir: string
  private log?: Logger

  constructor(options: StateStoreOptions) {
    this.dir = options.dir
    this.log = options.logger?.child({ component: 'StateStore' })
  }

  pathFor(instance: string): string {
    if (!INSTANCE_PATTERN.test(instance)) {
      throw new StateFileError(instance, [
        { path: 'instance', message: 'Must start with a letter or digit and contain only letters, digits, "_", "-" and "."' },
      ])
    }
    return join(this.dir, `${instance}.yml`)
  }

  /**
   * Stored state, or an empty state when none exists.
   */
  async load(instance: string): Promise<RunState> {
    const file = this.pathFor(instance)
    let content: string
    try {
      content = await readFile(file, 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {}
      }
      throw error
    }

    const result = safeParseRunState(parseYaml(content))
    if (!result.success) {
      throw new StateFileError(file, result.errors)
    }
    return result.data
  }

  /**
   * Persist `state`. A state that no longer references anything remote
   * removes the file instead.
   */
  async save(instance: string, state: RunState): Promise<void> {
    const file = this.pathFor(instance)
    if (!holdsRemoteResources(state)) {
      await this.remove(instance)
      return
    }

    await mkdir(this.dir, { recursive: true })
    const tempFile = `${file}.${randomBytes(4).toString('hex')}.tmp`
    try {
      await writeFile(tempFile, stringifyYaml(camelToSnakeDeep(state)))
      await rename(tempFile, file)
    } catch (error) {
      await rm(tempFile, { force: true })
      throw error
    }
    this.log?.debug({ file, phase: state.phase }, 'Saved run state')
  }

  async remove(instance: string): Promise<void> {
    const file = this.pathFor(instance)
    await rm(file, { force: true })
    this.log?.debug({ file }, 'Removed run state')
  }
}
