export * from './commands'
export {
  type CreateOptions,
  type CredentialSource,
  type DestroyReport,
  type DestroyStep,
  type DestroyStepName,
  ZoneLifecycle,
  type ZoneLifecycleOptions,
} from './lifecycle'
export { type RandomBytes, generateZoneName, sanitizeLabel, validateZoneName, ZONE_NAME_MAX_LENGTH } from './naming'
export {
  type RandomPort,
  type Sleep,
  type WaitForAddressOptions,
  defaultSleep,
  parseDhcpAddress,
  parseRedirectedPorts,
  selectForwardPort,
  waitForZoneAddress,
} from './network'
