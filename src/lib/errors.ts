/**
 * Raised when a host command (systemctl, ss) cannot be started, times out
 * or exits with a non-zero status.
 */
export class ExternalToolError extends Error {
  readonly command: string;
  readonly exitCode?: number;
  readonly stderr?: string;

  constructor(command: string, message: string, details: { exitCode?: number; stderr?: string } = {}) {
    super(message);
    this.name = 'ExternalToolError';
    this.command = command;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/** The registry refused a write because the service name is already taken. */
export class RegistryConflictError extends Error {
  readonly serviceName: string;

  constructor(serviceName: string, message = `Service already exists: ${serviceName}`) {
    super(message);
    this.name = 'RegistryConflictError';
    this.serviceName = serviceName;
  }
}

export class ScanInProgressError extends Error {
  constructor() {
    super('A scan is already in progress');
    this.name = 'ScanInProgressError';
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Service not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
