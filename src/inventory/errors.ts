/**
 * Inventory validation error types
 *
 * Every problem found in an inventory file is collected as a
 * ValidationIssue; loading fails once, listing all of them.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type InventoryIssueCode =
  | 'INVALID_DOCUMENT'
  | 'UNSUPPORTED_API_VERSION'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD'
  | 'DUPLICATE_IDENTITY'
  | 'UNKNOWN_DEVICE'
  | 'UNKNOWN_INTERFACE'
  | 'UNKNOWN_LAG_PARENT'
  | 'UNKNOWN_VLAN'
  | 'INVALID_VLAN_ID';

export type ValidationSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  code: InventoryIssueCode;
  severity: ValidationSeverity;
  message: string;
  /** Path to the problematic field (e.g., "sites[0].devices[1].interfaces[2].mtu") */
  path: string;
}

// =============================================================================
// Error Class
// =============================================================================

/**
 * Thrown when an inventory file cannot be read or fails validation
 */
export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = 'InventoryError';
  }

  get errors(): ValidationIssue[] {
    return this.issues.filter((issue) => issue.severity === 'error');
  }

  /**
   * Format the issues for display, one per line
   */
  formatIssues(): string {
    return this.issues
      .map((issue) => `${issue.severity === 'error' ? '✗' : '!'} [${issue.code}] ${issue.path}: ${issue.message}`)
      .join('\n');
  }
}

// =============================================================================
// Issue Builders
// =============================================================================

export function missingRequiredField(path: string, field: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: `Missing required field: "${field}"`,
    path,
  };
}

export function invalidField(path: string, expected: string): ValidationIssue {
  return {
    code: 'INVALID_FIELD',
    severity: 'error',
    message: `Expected ${expected}`,
    path,
  };
}

export function duplicateIdentity(path: string, kind: string, identity: string): ValidationIssue {
  return {
    code: 'DUPLICATE_IDENTITY',
    severity: 'error',
    message: `${kind} "${identity}" is defined more than once`,
    path,
  };
}

export function invalidVlanId(path: string, value: unknown): ValidationIssue {
  return {
    code: 'INVALID_VLAN_ID',
    severity: 'error',
    message: `VLAN id must be an integer between 1 and 4094, got ${JSON.stringify(value)}`,
    path,
  };
}
