/**
 * Core types for the zonekit zone provisioner
 */

// =============================================================================
// Identity Types
// =============================================================================

/**
 * Name of a zone on the global zone host.
 * Used to label every remote artifact and command for one provisioning run.
 * @example 'web-default-3f9c01ab'
 */
export type ZoneName = string

/**
 * Name of a test instance (the label a zone name is derived from).
 * @example 'default-solaris-11'
 */
export type InstanceName = string

// =============================================================================
// Run State
// =============================================================================

/**
 * Lifecycle phase of a zone run.
 * - `Idle`: nothing exists remotely (initial state, and the state after destroy)
 * - `KeysReady`: the credential pair exists locally
 * - `ArtifactsStaged`: zone config and profile are uploaded to the host
 * - `ZoneConfigured`: `zonecfg` accepted the zone definition
 * - `ZoneCloned`: the zone was cloned from the template
 * - `ZoneBooted`: the zone is booting
 * - `NetworkPending`: waiting for a DHCP address inside the zone
 * - `NetworkReady`: address known and NAT rule installed
 * - `NatRemoved`: teardown removed the NAT rule
 * - `ZoneUninstalled`: teardown uninstalled the zone
 * - `ZoneDeleted`: teardown deleted the zone configuration
 */
export type ZonePhase =
  | 'Idle'
  | 'KeysReady'
  | 'ArtifactsStaged'
  | 'ZoneConfigured'
  | 'ZoneCloned'
  | 'ZoneBooted'
  | 'NetworkPending'
  | 'NetworkReady'
  | 'NatRemoved'
  | 'ZoneUninstalled'
  | 'ZoneDeleted'

export const ZONE_PHASES: readonly ZonePhase[] = [
  'Idle',
  'KeysReady',
  'ArtifactsStaged',
  'ZoneConfigured',
  'ZoneCloned',
  'ZoneBooted',
  'NetworkPending',
  'NetworkReady',
  'NatRemoved',
  'ZoneUninstalled',
  'ZoneDeleted',
]

/**
 * Mutable record threaded through create and destroy.
 * Destroy works from this record alone.
 */
export interface RunState {
  /**
   * Current lifecycle phase.
   */
  phase?: ZonePhase

  /**
   * Zone the run created (or started creating).
   * @example 'web-default-3f9c01ab'
   */
  zoneName?: ZoneName

  /**
   * Address the zone obtained over DHCP.
   * @example '10.0.0.5'
   */
  zoneIp?: string

  /**
   * Port on the global zone host redirected to the zone.
   * @example 42022
   */
  zonePort?: number

  /**
   * Host the caller connects to for tests.
   * @example 'gz01.example.test'
   */
  hostname?: string

  /**
   * Port the caller connects to for tests (same as zonePort once ready).
   */
  port?: number

  /**
   * Account the caller logs in as inside the zone.
   * @example 'kitchen'
   */
  username?: string
}

/**
 * Connection details handed to the caller once a zone is ready.
 */
export interface ZoneEndpoint {
  hostname: string
  port: number
  username: string
  zoneName: ZoneName
}
