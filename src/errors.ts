export class ToolkitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolkitError';
  }
}

export class ConfigNotFoundError extends ToolkitError {
  constructor(public path: string) {
    super(`Config file not found: ${path}`);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigParseError extends ToolkitError {
  constructor(
    public path: string,
    public reason: string
  ) {
    super(`Failed to parse config file ${path}: ${reason}`);
    this.name = 'ConfigParseError';
  }
}

export class MissingRequiredFieldError extends ToolkitError {
  constructor(
    public field: string,
    public hint?: string
  ) {
    super(`Missing required value: ${field}${hint ? ` (${hint})` : ''}`);
    this.name = 'MissingRequiredFieldError';
  }
}

export class ArgumentError extends ToolkitError {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export class ResourceLookupError extends ToolkitError {
  constructor(
    message: string,
    public candidates: string[] = []
  ) {
    super(message);
    this.name = 'ResourceLookupError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
