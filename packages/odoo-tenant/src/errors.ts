/**
 * Error types surfaced by the CLI.
 *
 * `UserError` covers bad input and existence problems the operator can fix by
 * changing the invocation. `SystemError` covers failing external tools and
 * file access. The top-level handler prints the message of either and exits 1.
 */

export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SystemError extends Error {
  /** Diagnostic output of a failed child process, if any */
  readonly stderr?: string;

  constructor(message: string, stderr?: string) {
    super(message);
    this.name = new.target.name;
    this.stderr = stderr;
  }
}

// ============================================================================
// Validation
// ============================================================================

export class ValidationError extends UserError {}

export class ServiceValidationError extends ValidationError {}

export class InvalidKeyError extends ServiceValidationError {
  constructor(readonly invalidKeys: string[]) {
    super(`Invalid configuration keys: ${invalidKeys.join(', ')}`);
  }
}

export class InvalidValueTypeError extends ServiceValidationError {
  constructor(
    readonly key: string,
    readonly expectedType: string,
    readonly receivedType: string
  ) {
    super(`Invalid type for '${key}': expected ${expectedType}, got ${receivedType}`);
  }
}

export class InvalidRestartPolicyError extends ServiceValidationError {
  constructor(
    readonly invalidPolicy: string,
    readonly validPolicies: readonly string[]
  ) {
    super(`Invalid restart policy '${invalidPolicy}'. Must be one of: ${validPolicies.join(', ')}`);
  }
}

export class HostValidationError extends ValidationError {
  constructor(
    readonly host: string,
    reason: string
  ) {
    super(`Invalid host '${host}': ${reason}`);
  }
}

// ============================================================================
// Existence
// ============================================================================

export class ServiceNotFoundError extends UserError {
  constructor(readonly serviceName: string) {
    super(`Service '${serviceName}' does not exist`);
  }
}

export class ServiceAlreadyExistsError extends UserError {
  constructor(readonly serviceName: string) {
    super(`Service '${serviceName}' already exists`);
  }
}

export class OdooNotFoundError extends UserError {
  constructor(readonly odooName: string) {
    super(`Odoo environment '${odooName}' does not exist`);
  }
}

export class OdooAlreadyExistsError extends UserError {
  constructor(readonly odooName: string) {
    super(`Cannot add Odoo: Odoo with name ${odooName} already exists`);
  }
}

export class ConfigFileExistsError extends UserError {
  constructor(readonly filePath: string) {
    super(`Config file ${filePath} already exists`);
  }
}

export class SetupAlreadyExistsError extends UserError {
  constructor(readonly filePath: string) {
    super(`Cannot initialize: services already exist in ${filePath}`);
  }
}

export class SetupNotFoundError extends UserError {
  constructor(readonly filePath: string) {
    super(`No setup found: ${filePath} does not exist. Run init first.`);
  }
}

// ============================================================================
// External tools
// ============================================================================

export class DockerNotFoundError extends SystemError {
  constructor() {
    super("Neither 'docker compose' nor 'docker-compose' found");
  }
}

export class DockerCommandExecutionError extends SystemError {
  constructor(
    readonly command: string,
    readonly errorMessage: string,
    stderr?: string
  ) {
    super(`Docker command '${command}' failed: ${errorMessage}`, stderr);
  }
}

export class DatabaseCommandError extends SystemError {
  constructor(
    readonly command: string,
    readonly errorMessage: string,
    stderr?: string
  ) {
    super(`Database command '${command}' failed: ${errorMessage}`, stderr);
  }
}

// ============================================================================
// File access
// ============================================================================

export type FileOperation = 'read' | 'write';

export class FilePermissionError extends SystemError {
  constructor(
    readonly filePath: string,
    readonly operation: FileOperation,
    kind: string
  ) {
    super(`Permission denied: cannot ${operation} ${kind} '${filePath}'`);
  }
}

export class ComposeFilePermissionError extends FilePermissionError {
  constructor(filePath: string, operation: FileOperation) {
    super(filePath, operation, 'compose file');
  }
}

export class ConfigFilePermissionError extends FilePermissionError {
  constructor(filePath: string, operation: FileOperation) {
    super(filePath, operation, 'config file');
  }
}

/**
 * Whether `error` is a Node.js file system error for a denied access
 */
export function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'EACCES' || error.code === 'EPERM';
}
