export class ScopepackError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
  ) {
    super(message);
    this.name = 'ScopepackError';
  }
}

export class InvalidContextError extends ScopepackError {
  constructor(message: string) {
    super(message, 'INVALID_CONTEXT', false);
    this.name = 'InvalidContextError';
  }
}

export class UnknownContextError extends ScopepackError {
  constructor(public readonly context: string) {
    super(`Context '${context}' doesn't exist`, 'UNKNOWN_CONTEXT', true);
    this.name = 'UnknownContextError';
  }
}

export class UnknownPackageError extends ScopepackError {
  constructor(
    public readonly packageName: string,
    public readonly context: string,
  ) {
    super(
      `Package '${packageName}' doesn't exist in context '${context}'`,
      'UNKNOWN_PACKAGE',
      true,
    );
    this.name = 'UnknownPackageError';
  }
}

export class UnresolvableSetError extends ScopepackError {
  constructor(
    public readonly diagnostic: string,
    public readonly packages: readonly string[],
  ) {
    super(`Package list can't be validated: ${diagnostic}`, 'UNRESOLVABLE_SET', true);
    this.name = 'UnresolvableSetError';
  }
}

export class InvalidDeployDirectionError extends ScopepackError {
  constructor() {
    super('Cannot deploy a production database', 'INVALID_DEPLOY_DIRECTION', false);
    this.name = 'InvalidDeployDirectionError';
  }
}

export class UnsavedChangesError extends ScopepackError {
  constructor(public readonly pendingEdits: number) {
    super(
      `Cannot deploy uncommitted changes (${pendingEdits} pending edit(s)); save the session first`,
      'UNSAVED_CHANGES',
      true,
    );
    this.name = 'UnsavedChangesError';
  }
}

export class ConfigurationError extends ScopepackError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG', false);
    this.name = 'ConfigurationError';
  }
}

export function isScopepackError(error: unknown): error is ScopepackError {
  return error instanceof ScopepackError;
}
