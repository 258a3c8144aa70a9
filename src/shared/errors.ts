export class RecallDeckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RecallDeckError';
  }
}

export class ConfigError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class NotFoundError extends RecallDeckError {
  constructor(entity: 'source' | 'card' | 'tag' | 'entity', id: string) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${id}`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
  }
}

/**
 * A status edge the lifecycle tables do not permit. Nothing is mutated when
 * this is thrown.
 */
export class InvalidTransitionError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_TRANSITION', details);
    this.name = 'InvalidTransitionError';
  }
}

export class InvalidRatingError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_RATING', details);
    this.name = 'InvalidRatingError';
  }
}

export class DuplicateExternalKeyError extends RecallDeckError {
  constructor(originKind: string, externalKey: string, existingId: string) {
    super(`Source with external key '${externalKey}' already exists for ${originKind}`, 'DUPLICATE_EXTERNAL_KEY', {
      origin_kind: originKind,
      external_key: externalKey,
      existing_id: existingId,
    });
    this.name = 'DuplicateExternalKeyError';
  }
}

export class ValidationError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

export class DrafterError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DRAFTER_ERROR', details);
    this.name = 'DrafterError';
  }
}

export class ExportError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXPORT_ERROR', details);
    this.name = 'ExportError';
  }
}

/**
 * A third-party integration (Raindrop) is unconfigured, unreachable or
 * answered with something unusable.
 */
export class IntegrationError extends RecallDeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INTEGRATION_ERROR', details);
    this.name = 'IntegrationError';
  }
}
