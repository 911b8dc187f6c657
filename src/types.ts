/**
 * Shared types and interfaces for the netbox-sync CLI
 */

import type { NetboxClient } from './api/client.js';
import type { ApiLogger } from './api/logger.js';
import type { Settings } from './config/settings.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export type GlobalOptions = {
  /** Settings file (default: ./netbox-sync.yml) */
  config?: string;
  /** NetBox base URL, overrides settings */
  netboxAddress?: string;
  /** NetBox API token, overrides NETBOX_TOKEN and settings */
  netboxToken?: string;
  /** VLAN import mode: no, config or cli */
  importVlans?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
};

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved settings */
  settings: Settings;
  logger: ApiLogger;
  /** Builds the NetBox client for this invocation */
  createClient: (settings: Settings) => NetboxClient;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
