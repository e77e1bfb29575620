/**
 * Zone Lifecycle
 *
 * Creates and destroys one zone per run over a single administrative channel
 * to the global zone host. All progress is recorded in the caller's RunState,
 * so a failed or cancelled create can always be unwound by destroy.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join, posix } from 'node:path'
import type {
  ExecOptions,
  ExecResult,
  RemoteCommandChannel,
  RunState,
  ZoneEndpoint,
  ZoneName,
  ZonePhase,
} from '@zonekit/core'
import type { ArtifactRenderer } from '../artifacts'
import type { ResolvedDriverConfig } from '../config'
import { RemoteCommandError } from '../errors'
import type { Logger } from '../logger'
import {
  type Command,
  addNatRules,
  bootZone,
  cloneZone,
  configureZone,
  deleteZone,
  formatCommand,
  haltZone,
  listNatRules,
  makeTempDir,
  mkdirP,
  redirectRule,
  removeNatRules,
  removeTree,
  stagingRoot,
  uninstallZone,
} from './commands'
import { type RandomBytes, generateZoneName, validateZoneName } from './naming'
import {
  type RandomPort,
  type Sleep,
  parseRedirectedPorts,
  selectForwardPort,
  waitForZoneAddress,
} from './network'

/**
 * Source of the credential pair installed into the zone.
 */
export interface CredentialSource {
  ensure(): Promise<void>
  readPublicKey(): Promise<string>
}

export interface ZoneLifecycleOptions {
  config: ResolvedDriverConfig
  channel: RemoteCommandChannel
  credentials: CredentialSource
  renderer: ArtifactRenderer
  logger?: Logger

  /** Delay between address probes */
  sleep?: Sleep

  /** Entropy for generated zone names */
  randomBytes?: RandomBytes

  /** Picks forwarded ports when none is configured */
  randomPort?: RandomPort
}

export interface CreateOptions {
  /** Aborting stops the run and tears down whatever exists so far */
  signal?: AbortSignal
}

export type DestroyStepName = 'nat' | 'halt' | 'uninstall' | 'delete'

export interface DestroyStep {
  step: DestroyStepName
  command: string
  ok: boolean
  exitCode?: number
  error?: string
}

/**
 * Outcome of every teardown step. Destroy never throws on a failed step.
 */
export interface DestroyReport {
  zoneName?: ZoneName
  steps: DestroyStep[]
}

export class ZoneLifecycle {
  private config: ResolvedDriverConfig
  private channel: RemoteCommandChannel
  private credentials: CredentialSource
  private renderer: ArtifactRenderer
  private log?: Logger
  private sleep?: Sleep
  private randomBytes?: RandomBytes
  private randomPort?: RandomPort

  constructor(options: ZoneLifecycleOptions) {
    this.config = options.config
    this.channel = options.channel
    this.credentials = options.credentials
    this.renderer = options.renderer
    this.log = options.logger?.child({ component: 'ZoneLifecycle' })
    this.sleep = options.sleep
    this.randomBytes = options.randomBytes
    this.randomPort = options.randomPort
  }

  /**
   * Provision a zone and make it reachable through a redirected host port.
   *
   * Fills `state` as it goes and returns it. On failure the partial state is
   * left in place for a later destroy; on cancellation destroy runs here
   * before the error is rethrown.
   */
  async create(state: RunState = {}, options: CreateOptions = {}): Promise<RunState> {
    const { signal } = options
    try {
      await this.provision(state, signal)
      return state
    } catch (error) {
      if (signal?.aborted) {
        this.log?.warn(
          { zoneName: state.zoneName, phase: state.phase },
          'Create cancelled, tearing down partial zone',
        )
        await this.destroy(state)
      } else {
        this.log?.error({ err: error, zoneName: state.zoneName, phase: state.phase }, 'Zone creation failed')
      }
      throw error
    }
  }

  /**
   * Remove the NAT rule and the zone recorded in `state`.
   *
   * Every step is attempted even when an earlier one fails. Fields that
   * identify remote resources are cleared afterwards, so a second call is
   * a no-op.
   */
  async destroy(state: RunState): Promise<DestroyReport> {
    const report: DestroyReport = { zoneName: state.zoneName, steps: [] }

    if (state.zonePort !== undefined && state.zoneIp !== undefined) {
      const rule = this.redirectRuleFor(state.zonePort, state.zoneIp)
      report.steps.push(await this.attempt('nat', removeNatRules(), { stdin: rule }))
      delete state.zonePort
      delete state.zoneIp
      this.transition(state, 'NatRemoved')
    }

    if (state.zoneName !== undefined) {
      const zoneName = state.zoneName
      report.steps.push(await this.attempt('halt', haltZone(zoneName)))
      report.steps.push(await this.attempt('uninstall', uninstallZone(zoneName)))
      this.transition(state, 'ZoneUninstalled')
      report.steps.push(await this.attempt('delete', deleteZone(zoneName)))
      this.transition(state, 'ZoneDeleted')
      delete state.zoneName
    }

    delete state.zonePort
    delete state.zoneIp
    delete state.hostname
    delete state.port
    delete state.username
    this.transition(state, 'Idle')
    return report
  }

  /**
   * Connection details once the zone is ready, otherwise null.
   */
  endpoint(state: RunState): ZoneEndpoint | null {
    if (
      state.hostname === undefined ||
      state.port === undefined ||
      state.username === undefined ||
      state.zoneName === undefined
    ) {
      return null
    }
    return {
      hostname: state.hostname,
      port: state.port,
      username: state.username,
      zoneName: state.zoneName,
    }
  }

  private async provision(state: RunState, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    await this.credentials.ensure()
    this.transition(state, 'KeysReady')

    const zoneName = this.config.zoneName
      ? validateZoneName(this.config.zoneName)
      : generateZoneName(this.config.instanceName, this.randomBytes)

    await this.stageAndBoot(state, zoneName, signal)
    await this.bringUpNetwork(state, zoneName, signal)

    state.hostname = this.config.transportHost
    state.port = state.zonePort
    state.username = this.config.kitchenUserName
    this.log?.info({ zoneName, hostname: state.hostname, port: state.port }, 'Zone ready')
  }

  private async stageAndBoot(state: RunState, zoneName: ZoneName, signal?: AbortSignal): Promise<void> {
    const { config } = this
    const zoneConfig = this.renderer.renderZoneConfig({
      zonePath: posix.join(config.zonePathRoot, zoneName),
      lowerLink: config.zoneLowerLink,
      comment: config.zoneComment,
      linkName: config.zoneInterface,
    })
    const profile = this.renderer.renderProfile({
      zoneName,
      userName: config.kitchenUserName,
      publicKey: await this.credentials.readPublicKey(),
      interfaceName: config.zoneInterface,
    })

    const localDir = await mkdtemp(join(config.localStagingDir, 'zonekit-'))
    try {
      const configFile = join(localDir, `${zoneName}.cfg`)
      const profileFile = join(localDir, `${zoneName}_profile.xml`)
      await writeFile(configFile, zoneConfig, { mode: 0o600 })
      await writeFile(profileFile, profile, { mode: 0o600 })

      const remoteDir = await this.createRemoteWorkDir(signal)
      try {
        signal?.throwIfAborted()
        const remoteConfig = await this.channel.upload(configFile, remoteDir, { signal })
        const remoteProfile = await this.channel.upload(profileFile, remoteDir, { signal })
        this.transition(state, 'ArtifactsStaged')

        state.zoneName = zoneName
        await this.run(configureZone(zoneName, remoteConfig), { signal })
        this.transition(state, 'ZoneConfigured')
        await this.run(cloneZone(zoneName, remoteProfile, config.zoneTemplate), { signal })
        this.transition(state, 'ZoneCloned')
        await this.run(bootZone(zoneName), { signal })
        this.transition(state, 'ZoneBooted')
      } finally {
        await this.cleanupRemoteDir(remoteDir)
      }
    } finally {
      if (config.keepConfig) {
        this.log?.info({ dir: localDir }, 'Keeping rendered artifacts')
      } else {
        await rm(localDir, { recursive: true, force: true })
      }
    }
  }

  private async createRemoteWorkDir(signal?: AbortSignal): Promise<string> {
    const root = stagingRoot(this.config.zonePathRoot)
    await this.run(mkdirP(root), { signal })
    const command = makeTempDir(root)
    const result = await this.run(command, { signal })
    const dir = result.stdout.trim()
    if (dir === '') {
      throw new RemoteCommandError(command, { ...result, stderr: 'no directory printed' })
    }
    return dir
  }

  /**
   * Failures here are logged only; they must not replace an error from the
   * zone commands.
   */
  private async cleanupRemoteDir(remoteDir: string): Promise<void> {
    if (this.config.keepConfig) {
      this.log?.info({ dir: remoteDir }, 'Keeping remote staging directory')
      return
    }
    const command = removeTree(remoteDir)
    try {
      const result = await this.channel.exec(command)
      if (result.exitCode !== 0) {
        this.log?.warn(
          { dir: remoteDir, exitCode: result.exitCode, stderr: result.stderr.trim() },
          'Failed to remove remote staging directory',
        )
      }
    } catch (error) {
      this.log?.warn({ err: error, dir: remoteDir }, 'Failed to remove remote staging directory')
    }
  }

  private async bringUpNetwork(state: RunState, zoneName: ZoneName, signal?: AbortSignal): Promise<void> {
    const { config } = this
    this.transition(state, 'NetworkPending')
    this.log?.info({ zoneName }, 'Waiting for zone to obtain an address')

    const address = await waitForZoneAddress(this.channel, zoneName, {
      interfaceName: config.zoneInterface,
      intervalMs: config.networkPollInterval,
      maxAttempts: config.networkMaxAttempts,
      signal,
      sleep: this.sleep,
      logger: this.log,
    })
    state.zoneIp = address

    const port = config.zonePort ?? (await this.pickForwardPort(signal))
    // Recorded before the rule goes in so an interrupted add is still removed
    state.zonePort = port
    await this.run(addNatRules(), { stdin: this.redirectRuleFor(port, address), signal })
    this.transition(state, 'NetworkReady')
  }

  private async pickForwardPort(signal?: AbortSignal): Promise<number> {
    let inUse = new Set<number>()
    try {
      const result = await this.channel.exec(listNatRules(), { signal })
      if (result.exitCode === 0) {
        inUse = parseRedirectedPorts(result.stdout)
      } else {
        this.log?.debug({ exitCode: result.exitCode }, 'Could not list NAT rules, assuming none')
      }
    } catch (error) {
      if (signal?.aborted) throw error
      this.log?.debug({ err: error }, 'Could not list NAT rules, assuming none')
    }
    return selectForwardPort(inUse, this.randomPort)
  }

  private redirectRuleFor(port: number, address: string): string {
    return redirectRule({
      interfaceName: this.config.zoneInterface,
      externalPort: port,
      address,
      internalPort: this.config.zoneServicePort,
    })
  }

  private async run(command: Command, options: ExecOptions = {}): Promise<ExecResult> {
    this.log?.debug({ command: formatCommand(command) }, 'Running remote command')
    const result = await this.channel.exec(command, options)
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(command, result)
    }
    return result
  }

  private async attempt(
    step: DestroyStepName,
    command: Command,
    options: ExecOptions = {},
  ): Promise<DestroyStep> {
    const formatted = formatCommand(command)
    try {
      const result = await this.channel.exec(command, options)
      if (result.exitCode !== 0) {
        this.log?.warn(
          { step, command: formatted, exitCode: result.exitCode, stderr: result.stderr.trim() },
          'Teardown step failed, continuing',
        )
      }
      return { step, command: formatted, ok: result.exitCode === 0, exitCode: result.exitCode }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.log?.warn({ err: error, step, command: formatted }, 'Teardown step failed, continuing')
      return { step, command: formatted, ok: false, error: message }
    }
  }

  private transition(state: RunState, phase: ZonePhase): void {
    state.phase = phase
    this.log?.info({ zoneName: state.zoneName, phase }, `Zone phase: ${phase}`)
  }
}
