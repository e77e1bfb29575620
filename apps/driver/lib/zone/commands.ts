/**
 * Remote command builders
 *
 * Every command is an argument vector; the channel quotes each argument, so
 * names and paths from configuration can never be re-split by the shell.
 */

import { posix } from 'node:path'
import type { ZoneName } from '@zonekit/core'

export type Command = readonly string[]

const ZONECFG = '/usr/sbin/zonecfg'
const ZONEADM = '/usr/sbin/zoneadm'
const ZLOGIN = '/usr/sbin/zlogin'
const IPNAT = '/usr/sbin/ipnat'

/** Directory under the zone root that holds per-run staging directories */
export function stagingRoot(zonePathRoot: string): string {
  return posix.join(zonePathRoot, 'zonekit_tmp')
}

export const mkdirP = (dir: string): Command => ['mkdir', '-p', dir]

export const makeTempDir = (parent: string): Command => ['mktemp', '-d', '-p', parent]

export const removeTree = (dir: string): Command => ['rm', '-rf', dir]

export const configureZone = (zone: ZoneName, configFile: string): Command => [
  ZONECFG,
  '-z',
  zone,
  '-f',
  configFile,
]

export const cloneZone = (zone: ZoneName, profileFile: string, template: string): Command => [
  ZONEADM,
  '-z',
  zone,
  'clone',
  '-c',
  profileFile,
  template,
]

export const bootZone = (zone: ZoneName): Command => [ZONEADM, '-z', zone, 'boot']

export const haltZone = (zone: ZoneName): Command => [ZONEADM, '-z', zone, 'halt']

export const uninstallZone = (zone: ZoneName): Command => [ZONEADM, '-z', zone, 'uninstall', '-F']

export const deleteZone = (zone: ZoneName): Command => [ZONECFG, '-z', zone, 'delete', '-F']

export const showZoneAddresses = (zone: ZoneName): Command => [ZLOGIN, zone, 'ipadm', 'show-addr']

export const listNatRules = (): Command => [IPNAT, '-l']

/** Reads rules from stdin */
export const addNatRules = (): Command => [IPNAT, '-f', '-']

/** Reads rules from stdin */
export const removeNatRules = (): Command => [IPNAT, '-r', '-f', '-']

export interface RedirectRule {
  interfaceName: string
  externalPort: number
  address: string
  internalPort: number
}

/**
 * ipnat redirection rule, newline-terminated.
 * @example 'rdr net0 0.0.0.0/0 port 42022 -> 10.0.0.5 port 22\n'
 */
export function redirectRule(rule: RedirectRule): string {
  return `rdr ${rule.interfaceName} 0.0.0.0/0 port ${rule.externalPort} -> ${rule.address} port ${rule.internalPort}\n`
}

export function formatCommand(command: Command): string {
  return command.join(' ')
}
