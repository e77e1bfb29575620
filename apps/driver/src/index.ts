/**
 * Zone driver
 *
 * Wires the administrative channel, credential provisioning, artifact
 * rendering and the zone lifecycle from one resolved configuration.
 */

import { readFile } from 'node:fs/promises'
import type { RemoteCommandChannel } from '@zonekit/core'
import { type SshChannelConfig, SshCommandChannel } from '@zonekit/ssh'
import { ArtifactRenderer, loadTemplates } from '../lib/artifacts'
import type { ResolvedDriverConfig } from '../lib/config'
import { KeyPairProvisioner } from '../lib/credentials'
import { ConfigValidationError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import { ZoneLifecycle } from '../lib/zone'

export interface ZoneDriverOptions {
  logger?: Logger

  /** Replaces the SSH channel to the global zone */
  channel?: RemoteCommandChannel

  /**
   * Agent socket used when no administrative key file is configured.
   * @default process.env.SSH_AUTH_SOCK
   */
  agent?: string
}

export interface ZoneDriver {
  config: ResolvedDriverConfig
  channel: RemoteCommandChannel
  credentials: KeyPairProvisioner
  lifecycle: ZoneLifecycle
  /** Ends the administrative session */
  close(): Promise<void>
}

/**
 * Connection settings for the administrative session.
 */
export async function adminChannelConfig(
  config: ResolvedDriverConfig,
  agent: string | undefined = process.env.SSH_AUTH_SOCK,
): Promise<SshChannelConfig> {
  const base = {
    host: config.globalZoneHost,
    port: config.globalZonePort,
    username: config.globalZoneUsername,
  }
  if (config.globalZonePrivateKey !== undefined) {
    return { ...base, privateKey: await readFile(config.globalZonePrivateKey) }
  }
  if (agent) {
    return { ...base, agent }
  }
  throw new ConfigValidationError('environment', [
    {
      path: 'global_zone_private_key',
      message: 'Set a key file for the global zone or run an SSH agent (SSH_AUTH_SOCK)',
    },
  ])
}

/**
 * Provisioner for the key pair installed into zones.
 */
export function createCredentials(config: ResolvedDriverConfig, logger?: Logger): KeyPairProvisioner {
  return new KeyPairProvisioner({
    publicKeyPath: config.sshPublicKey,
    privateKeyPath: config.sshPrivateKey,
    comment: config.sshKeyComment,
    bits: config.sshKeyBits,
    logger,
  })
}

export async function createZoneDriver(
  config: ResolvedDriverConfig,
  options: ZoneDriverOptions = {},
): Promise<ZoneDriver> {
  const { logger } = options
  const credentials = createCredentials(config, logger)
  const renderer = new ArtifactRenderer(await loadTemplates(config.templatesDir))
  const channel =
    options.channel ?? new SshCommandChannel(await adminChannelConfig(config, options.agent))

  logger?.debug(
    { host: config.globalZoneHost, channel: channel.name, templatesDir: config.templatesDir },
    'Zone driver ready',
  )

  return {
    config,
    channel,
    credentials,
    lifecycle: new ZoneLifecycle({ config, channel, credentials, renderer, logger }),
    close: () => channel.close(),
  }
}

export * from '../lib/artifacts'
export * from '../lib/config'
export * from '../lib/credentials'
export * from '../lib/errors'
export * from '../lib/logger'
export * from '../lib/state'
export * from '../lib/zone'
