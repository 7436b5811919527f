/**
 * Typed error catalog for workflow actions.
 *
 * Expected conditions (unknown profile, unknown setting) are caught by the
 * actions and shown to the user; the rest abort the invocation.
 */

export class WorkflowError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Query errors

export class MalformedQueryError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_QUERY', message, details);
  }
}

// Profile and setting errors

export class ProfileNotFoundError extends WorkflowError {
  constructor(public readonly profileId: string) {
    super('PROFILE_NOT_FOUND', 'No such keyword / Fuzzy Folder', { profileId });
  }
}

export class UnknownSettingError extends WorkflowError {
  constructor(public readonly setting: string) {
    super('UNKNOWN_SETTING', `Unknown setting : ${setting}`, { setting });
  }
}

export class InvalidSettingValueError extends WorkflowError {
  constructor(setting: string, value: string | number) {
    super('INVALID_SETTING_VALUE', `Invalid value for ${setting} : ${value}`, {
      setting,
      value,
    });
  }
}

// External collaborators

export class IndexerFailureError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INDEXER_FAILURE', message, details);
  }
}

export class TriggerRegistryError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRIGGER_REGISTRY', message, details);
  }
}
