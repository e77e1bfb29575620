/**
 * Artifact Renderer
 *
 * Turns run parameters into the two documents the zone toolchain consumes:
 * the zonecfg command file and the system configuration profile. Output is a
 * pure function of the templates and the parameters.
 */

import { ArtifactValidationError } from '../errors'
import { type ArtifactTemplates, escapeXml, renderTemplate } from './templates'

const ZONE_CONFIG = 'zone config'
const PROFILE = 'profile'

export interface ZoneConfigParams {
  /**
   * @example '/systems/zones/demo-ab12cd34'
   */
  zonePath: string

  /**
   * Link the zone NIC sits on.
   * @example 'kitchenstub0'
   */
  lowerLink: string

  /** Free text; may be empty */
  comment: string

  /**
   * Name of the zone NIC.
   * @default 'net0'
   */
  linkName?: string
}

export interface ProfileParams {
  /** Node name inside the zone */
  zoneName: string

  /** Account created inside the zone */
  userName: string

  /** authorized_keys line for the account */
  publicKey: string

  /**
   * NIC configured for DHCP.
   * @default 'net0'
   */
  interfaceName?: string
}

function requireValue(artifact: string, field: string, value: string): string {
  if (value.trim() === '') {
    throw new ArtifactValidationError(artifact, field, 'must not be empty')
  }
  return value
}

/**
 * zonecfg reads one command per line and only the comment is quoted.
 */
function escapeZonecfgValue(value: string, key: string): string {
  if (/["\\\r\n]/.test(value)) {
    throw new ArtifactValidationError(
      ZONE_CONFIG,
      key,
      'must not contain quotes, backslashes or line breaks',
    )
  }
  if (key !== 'zone_comment' && /\s/.test(value)) {
    throw new ArtifactValidationError(ZONE_CONFIG, key, 'must not contain whitespace')
  }
  return value
}

export class ArtifactRenderer {
  private templates: ArtifactTemplates

  constructor(templates: ArtifactTemplates) {
    this.templates = templates
  }

  renderZoneConfig(params: ZoneConfigParams): string {
    const zonePath = requireValue(ZONE_CONFIG, 'zone_path', params.zonePath)
    if (!zonePath.startsWith('/')) {
      throw new ArtifactValidationError(ZONE_CONFIG, 'zone_path', 'must be an absolute path')
    }

    return renderTemplate(
      ZONE_CONFIG,
      this.templates.zoneConfig,
      {
        zone_path: zonePath,
        zone_lower_link: requireValue(ZONE_CONFIG, 'zone_lower_link', params.lowerLink),
        zone_link_name: requireValue(ZONE_CONFIG, 'zone_link_name', params.linkName ?? 'net0'),
        zone_comment: params.comment,
      },
      escapeZonecfgValue,
    )
  }

  renderProfile(params: ProfileParams): string {
    return renderTemplate(
      PROFILE,
      this.templates.profile,
      {
        zone_name: requireValue(PROFILE, 'zone_name', params.zoneName),
        kitchen_user_name: requireValue(PROFILE, 'kitchen_user_name', params.userName),
        ssh_public_key: requireValue(PROFILE, 'ssh_public_key', params.publicKey).trim(),
        zone_interface: requireValue(PROFILE, 'zone_interface', params.interfaceName ?? 'net0'),
      },
      escapeXml,
    )
  }
}
