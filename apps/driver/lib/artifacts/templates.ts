/**
 * Artifact templates
 *
 * Templates are plain text with ${name} placeholders. They are read from disk
 * once; rendering itself touches nothing but its arguments.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { ArtifactValidationError } from '../errors'

export const ZONE_CONFIG_TEMPLATE = 'zone.cfg.tmpl'
export const PROFILE_TEMPLATE = 'profile.xml.tmpl'

export interface ArtifactTemplates {
  /** zonecfg command file */
  zoneConfig: string
  /** System configuration profile (SMF XML) */
  profile: string
}

export async function loadTemplates(dir: string): Promise<ArtifactTemplates> {
  const [zoneConfig, profile] = await Promise.all([
    readFile(join(dir, ZONE_CONFIG_TEMPLATE), 'utf-8'),
    readFile(join(dir, PROFILE_TEMPLATE), 'utf-8'),
  ])
  return { zoneConfig, profile }
}

export type ValueEscaper = (value: string, key: string) => string

/**
 * Substitute every ${key} in the template. A placeholder without a value fails.
 */
export function renderTemplate(
  artifact: string,
  template: string,
  values: Readonly<Record<string, string>>,
  escape: ValueEscaper,
): string {
  return template.replace(/\$\{([A-Za-z0-9_]+)\}/g, (_match, key: string) => {
    if (!Object.hasOwn(values, key)) {
      throw new ArtifactValidationError(artifact, key, 'has no value')
    }
    return escape(values[key], key)
  })
}

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
}

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ENTITIES[char])
}
