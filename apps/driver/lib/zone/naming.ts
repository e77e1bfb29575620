/**
 * Zone names
 *
 * Platform rules: case-sensitive, starts with a letter or digit, then letters,
 * digits, "_", "-" and "."; at most 64 characters; "global" and anything
 * starting with "SUNW" are reserved.
 */

import { randomBytes } from 'node:crypto'
import type { ZoneName } from '@zonekit/core'
import { ZoneNameError } from '../errors'

export const ZONE_NAME_MAX_LENGTH = 64

/** Random suffix length in hex characters (32 bits) */
const SUFFIX_LENGTH = 8
const LABEL_MAX_LENGTH = ZONE_NAME_MAX_LENGTH - SUFFIX_LENGTH - 1
const ZONE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/

export type RandomBytes = (size: number) => Buffer

export function validateZoneName(name: string): ZoneName {
  if (name.length === 0) {
    throw new ZoneNameError(name, 'must not be empty')
  }
  if (name.length > ZONE_NAME_MAX_LENGTH) {
    throw new ZoneNameError(name, `must be at most ${ZONE_NAME_MAX_LENGTH} characters`)
  }
  if (!ZONE_NAME_PATTERN.test(name)) {
    throw new ZoneNameError(
      name,
      'must start with a letter or digit and contain only letters, digits, "_", "-" and "."',
    )
  }
  if (name === 'global') {
    throw new ZoneNameError(name, 'is reserved')
  }
  if (name.startsWith('SUNW')) {
    throw new ZoneNameError(name, 'must not start with the reserved prefix SUNW')
  }
  return name
}

/**
 * Reduce an arbitrary label to something usable as a zone name prefix.
 */
export function sanitizeLabel(label: string): string {
  let cleaned = label.replace(/[^A-Za-z0-9_.-]/g, '-').replace(/^[^A-Za-z0-9]+/, '')
  if (cleaned.startsWith('SUNW') || cleaned === 'global') {
    cleaned = `z${cleaned}`
  }
  cleaned = cleaned.slice(0, LABEL_MAX_LENGTH)
  return cleaned === '' ? 'zone' : cleaned
}

/**
 * `<label>-<8 hex>`, unique enough for many runs sharing one host.
 */
export function generateZoneName(label: string, random: RandomBytes = randomBytes): ZoneName {
  const suffix = random(SUFFIX_LENGTH / 2).toString('hex')
  return validateZoneName(`${sanitizeLabel(label)}-${suffix}`)
}
