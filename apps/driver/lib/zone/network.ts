/**
 * Zone networking
 *
 * Waiting for the zone's DHCP address and choosing the host port that is
 * redirected to it.
 */

import { randomInt } from 'node:crypto'
import { setTimeout as delay } from 'node:timers/promises'
import {
  type ExecResult,
  FORWARD_PORT_MAX,
  FORWARD_PORT_MIN,
  type RemoteCommandChannel,
  type ZoneName,
} from '@zonekit/core'
import { NetworkTimeoutError, PortSelectionError } from '../errors'
import type { Logger } from '../logger'
import { showZoneAddresses } from './commands'

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal })
  } catch (error) {
    // Timers reject with their own AbortError; callers expect the signal's reason
    if (signal?.aborted) throw signal.reason
    throw error
  }
}

/** Picks an integer in [min, max] */
export type RandomPort = (min: number, max: number) => number

export const defaultRandomPort: RandomPort = (min, max) => randomInt(min, max + 1)

const MAX_PORT_TRIES = 32

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Extract the DHCP-assigned IPv4 address of an interface from
 * `ipadm show-addr` output. Null until the address is bound and up.
 *
 * @example parseDhcpAddress('net0/v4  dhcp  ok  10.0.0.5/24') // '10.0.0.5'
 */
export function parseDhcpAddress(output: string, interfaceName = 'net0'): string | null {
  const pattern = new RegExp(
    `^\\s*${escapeRegExp(interfaceName)}/v4\\s+dhcp\\s+ok\\s+(\\d{1,3}(?:\\.\\d{1,3}){3})/\\d{1,2}\\b`,
    'm',
  )
  return output.match(pattern)?.[1] ?? null
}

export interface WaitForAddressOptions {
  /** @default 'net0' */
  interfaceName?: string

  /** Pause before each probe */
  intervalMs: number

  /** Probes before giving up with NetworkTimeoutError */
  maxAttempts: number

  signal?: AbortSignal
  sleep?: Sleep
  logger?: Logger
}

/**
 * Poll the zone until it reports a DHCP address.
 *
 * A probe that fails (non-zero exit, transport error) counts as "not yet".
 * Cancellation through `signal` is the only way to stop early.
 */
export async function waitForZoneAddress(
  channel: RemoteCommandChannel,
  zoneName: ZoneName,
  options: WaitForAddressOptions,
): Promise<string> {
  const { intervalMs, maxAttempts, signal } = options
  const interfaceName = options.interfaceName ?? 'net0'
  const sleep = options.sleep ?? defaultSleep
  const log = options.logger
  const command = showZoneAddresses(zoneName)
  const started = Date.now()

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    await sleep(intervalMs, signal)

    let result: ExecResult
    try {
      result = await channel.exec(command, { signal })
    } catch (error) {
      if (signal?.aborted) throw error
      log?.warn({ err: error, zoneName, attempt }, 'Address probe failed, retrying')
      continue
    }

    const address = result.exitCode === 0 ? parseDhcpAddress(result.stdout, interfaceName) : null
    if (address) {
      log?.info({ zoneName, address, attempt }, 'Zone obtained an address')
      return address
    }
    log?.debug({ zoneName, attempt, exitCode: result.exitCode }, 'Zone has no address yet')
  }

  throw new NetworkTimeoutError(zoneName, maxAttempts, Date.now() - started)
}

/**
 * Host ports already used by redirection rules in `ipnat -l` output.
 */
export function parseRedirectedPorts(output: string): Set<number> {
  const ports = new Set<number>()
  for (const match of output.matchAll(/^\s*rdr\s+\S+\s+\S+\s+port\s+(\d+)\s+->/gm)) {
    ports.add(Number.parseInt(match[1], 10))
  }
  return ports
}

/**
 * Random unprivileged port that is not in `inUse`.
 */
export function selectForwardPort(
  inUse: ReadonlySet<number>,
  random: RandomPort = defaultRandomPort,
): number {
  for (let i = 0; i < MAX_PORT_TRIES; i++) {
    const port = random(FORWARD_PORT_MIN, FORWARD_PORT_MAX)
    if (!inUse.has(port)) return port
  }
  throw new PortSelectionError(MAX_PORT_TRIES)
}
