/**
 * Settings resolution for netbox-sync
 *
 * ## Resolution order (per value)
 *
 * 1. CLI flag (`--netbox-address`, `--import-vlans`, ...)
 * 2. Environment variable
 * 3. Settings file (`netbox-sync.yml` in the working directory, or `--config <path>`)
 * 4. Built-in default
 *
 * ## Environment Variables
 *
 * - NETBOX_ADDRESS: Base URL of the NetBox instance
 * - NETBOX_TOKEN: API token
 * - NETBOX_SYNC_IMPORT_VLANS: `no`, `config` or `cli`
 * - NETBOX_SYNC_LOG_LEVEL: `debug`, `info`, `warn` or `error`
 * - NETBOX_SYNC_LOG_JSON: `true` for JSON log lines
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseLogLevel, type LogLevel } from '../api/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * How VLANs are imported. `config` and `cli` differ only in where the
 * desired VLANs come from upstream; both resolve VLAN references the
 * same way when interfaces are translated.
 */
export type ImportVlansMode = 'no' | 'config' | 'cli';

export const IMPORT_VLANS_MODES: readonly ImportVlansMode[] = ['no', 'config', 'cli'];

export interface Settings {
  netbox: {
    address: string;
    token?: string;
    /** Request timeout in ms */
    timeout: number;
  };
  main: {
    importVlans: ImportVlansMode;
  };
  logs: {
    level: LogLevel;
    json: boolean;
  };
}

/**
 * Values given on the command line
 */
export interface SettingsOverrides {
  configPath?: string;
  netboxAddress?: string;
  netboxToken?: string;
  importVlans?: string;
  logLevel?: string;
}

export const DEFAULT_SETTINGS_FILE = 'netbox-sync.yml';

export const DEFAULT_SETTINGS: Settings = {
  netbox: {
    address: '',
    timeout: 30000,
  },
  main: {
    importVlans: 'config',
  },
  logs: {
    level: 'info',
    json: false,
  },
};

/**
 * Raised when the settings file cannot be read or holds invalid values
 */
export class SettingsError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'SettingsError';
  }
}

// =============================================================================
// Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseImportVlans(value: string | undefined): ImportVlansMode | undefined {
  if (value === undefined) return undefined;
  return IMPORT_VLANS_MODES.find((mode) => mode === value.toLowerCase());
}

/**
 * Settings read from a file. Every field is optional; unknown keys are ignored.
 */
export interface FileSettings {
  netbox?: { address?: string; token?: string; timeout?: number };
  main?: { importVlans?: ImportVlansMode };
  logs?: { level?: LogLevel; json?: boolean };
}

/**
 * Validate the parsed YAML document of a settings file
 *
 * @param raw - YAML document (already parsed)
 * @param source - File path for error messages
 * @throws SettingsError listing every invalid field
 */
export function parseSettingsDocument(raw: unknown, source: string): FileSettings {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new SettingsError(`Settings file ${source} must contain a mapping`);
  }

  const issues: string[] = [];
  const result: FileSettings = {};

  const netbox = raw.netbox;
  if (netbox !== undefined) {
    if (!isRecord(netbox)) {
      issues.push('netbox must be a mapping');
    } else {
      result.netbox = {};
      if (netbox.address !== undefined) {
        if (typeof netbox.address === 'string') result.netbox.address = netbox.address;
        else issues.push('netbox.address must be a string');
      }
      if (netbox.token !== undefined) {
        if (typeof netbox.token === 'string') result.netbox.token = netbox.token;
        else issues.push('netbox.token must be a string');
      }
      if (netbox.timeout !== undefined) {
        if (typeof netbox.timeout === 'number' && netbox.timeout > 0) {
          result.netbox.timeout = netbox.timeout;
        } else {
          issues.push('netbox.timeout must be a positive number of milliseconds');
        }
      }
    }
  }

  const main = raw.main;
  if (main !== undefined) {
    if (!isRecord(main)) {
      issues.push('main must be a mapping');
    } else {
      // Accept both spellings used in hand-written files
      const value = main.import_vlans ?? main.importVlans;
      if (value !== undefined) {
        // YAML reads a bare `no` as a string under the 1.2 core schema,
        // but `false` is the natural way to write it too
        const mode = value === false ? 'no' : typeof value === 'string' ? parseImportVlans(value) : undefined;
        if (mode) result.main = { importVlans: mode };
        else issues.push(`main.import_vlans must be one of ${IMPORT_VLANS_MODES.join(', ')}`);
      }
    }
  }

  const logs = raw.logs;
  if (logs !== undefined) {
    if (!isRecord(logs)) {
      issues.push('logs must be a mapping');
    } else {
      result.logs = {};
      if (logs.level !== undefined) {
        const level = typeof logs.level === 'string' ? parseLogLevel(logs.level) : undefined;
        if (level) result.logs.level = level;
        else issues.push('logs.level must be one of debug, info, warn, error');
      }
      if (logs.json !== undefined) {
        if (typeof logs.json === 'boolean') result.logs.json = logs.json;
        else issues.push('logs.json must be a boolean');
      }
    }
  }

  if (issues.length > 0) {
    throw new SettingsError(`Invalid settings in ${source}`, issues);
  }

  return result;
}

/**
 * Read a settings file. A missing default file is not an error; a
 * missing file that was asked for explicitly is.
 */
export function readSettingsFile(configPath?: string, cwd: string = process.cwd()): FileSettings {
  const explicit = configPath !== undefined;
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_SETTINGS_FILE);

  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw new SettingsError(`Settings file not found: ${filePath}`);
    }
    return {};
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new SettingsError(
      `Failed to read settings file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new SettingsError(
      `Failed to parse settings file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseSettingsDocument(raw, filePath);
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merge CLI overrides, environment and file settings over the defaults
 */
export function resolveSettings(
  file: FileSettings,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const importVlansInput = overrides.importVlans ?? env.NETBOX_SYNC_IMPORT_VLANS;
  const importVlans = parseImportVlans(importVlansInput);
  if (importVlansInput !== undefined && !importVlans) {
    throw new SettingsError(
      `Invalid import-vlans mode "${importVlansInput}". Expected one of: ${IMPORT_VLANS_MODES.join(', ')}`
    );
  }

  const levelInput = overrides.logLevel ?? env.NETBOX_SYNC_LOG_LEVEL;
  const level = parseLogLevel(levelInput);
  if (levelInput !== undefined && !level) {
    throw new SettingsError(`Invalid log level "${levelInput}"`);
  }

  return {
    netbox: {
      address:
        overrides.netboxAddress ??
        env.NETBOX_ADDRESS ??
        file.netbox?.address ??
        DEFAULT_SETTINGS.netbox.address,
      token: overrides.netboxToken ?? env.NETBOX_TOKEN ?? file.netbox?.token,
      timeout: file.netbox?.timeout ?? DEFAULT_SETTINGS.netbox.timeout,
    },
    main: {
      importVlans: importVlans ?? file.main?.importVlans ?? DEFAULT_SETTINGS.main.importVlans,
    },
    logs: {
      level: level ?? file.logs?.level ?? DEFAULT_SETTINGS.logs.level,
      json:
        env.NETBOX_SYNC_LOG_JSON !== undefined
          ? env.NETBOX_SYNC_LOG_JSON === 'true'
          : file.logs?.json ?? DEFAULT_SETTINGS.logs.json,
    },
  };
}

/**
 * Load settings from file, environment and CLI overrides
 */
export function loadSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Settings {
  return resolveSettings(readSettingsFile(overrides.configPath, cwd), overrides, env);
}

/**
 * Settings with the token hidden, for verbose output
 */
export function describeSettings(settings: Settings): Record<string, unknown> {
  return {
    netboxAddress: settings.netbox.address || '(unset)',
    hasToken: Boolean(settings.netbox.token),
    importVlans: settings.main.importVlans,
    logLevel: settings.logs.level,
  };
}
