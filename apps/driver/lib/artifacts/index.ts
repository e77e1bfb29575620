export { ArtifactRenderer, type ProfileParams, type ZoneConfigParams } from './renderer'
export {
  type ArtifactTemplates,
  PROFILE_TEMPLATE,
  ZONE_CONFIG_TEMPLATE,
  escapeXml,
  loadTemplates,
  renderTemplate,
} from './templates'
