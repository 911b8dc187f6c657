/**
 * Configuration module exports
 */

export {
  loadSettings,
  readSettingsFile,
  resolveSettings,
  parseSettingsDocument,
  parseImportVlans,
  describeSettings,
  SettingsError,
  DEFAULT_SETTINGS,
  DEFAULT_SETTINGS_FILE,
  IMPORT_VLANS_MODES,
  type Settings,
  type FileSettings,
  type SettingsOverrides,
  type ImportVlansMode,
} from './settings.js';
