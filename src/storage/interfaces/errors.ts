/**
 * Raised by a storage implementation when a write would break a unique key
 */
export class UniqueConstraintError extends Error {
  public readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `Unique constraint violated on ${field}`);
    this.name = 'UniqueConstraintError';
    this.field = field;
  }
}

/**
 * Raised when `save` targets a record that does not exist
 */
export class RecordNotFoundError extends Error {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} does not exist`);
    this.name = 'RecordNotFoundError';
  }
}
