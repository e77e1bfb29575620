/**
 * Shared test fixtures using Faker.js
 */

import { faker } from '@faker-js/faker'
import type { DriverConfig } from '@zonekit/core'
import {
  type ResolutionContext,
  type ResolvedDriverConfig,
  parseDriverConfig,
  resolveDriverConfig,
} from '../lib/config'

// =============================================================================
// Configuration
// =============================================================================

/**
 * Validated configuration from snake_case keys; only the host is required.
 */
export function createDriverConfig(overrides: Record<string, unknown> = {}): DriverConfig {
  return parseDriverConfig(
    { global_zone_host: faker.internet.domainName(), ...overrides },
    'test fixture',
  )
}

export function createResolutionContext(overrides?: Partial<ResolutionContext>): ResolutionContext {
  return {
    instanceName: `${faker.word.noun()}-${faker.string.alphanumeric(4).toLowerCase()}`,
    cwd: `/work/${faker.word.noun()}`,
    homeDir: `/home/${faker.internet.userName().toLowerCase()}`,
    login: faker.internet.userName().toLowerCase(),
    hostname: faker.internet.domainWord(),
    tmpDir: '/tmp',
    now: faker.date.recent(),
    ...overrides,
  }
}

export function createResolvedConfig(
  overrides: Record<string, unknown> = {},
  context?: Partial<ResolutionContext>,
): ResolvedDriverConfig {
  return resolveDriverConfig(createDriverConfig(overrides), createResolutionContext(context))
}
