export type StorageOperation = 'read' | 'write' | 'remove';

export class StorageUnavailableError extends Error {
  public readonly location: string;
  public readonly operation: StorageOperation;

  constructor(location: string, operation: StorageOperation, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cache storage ${location} could not be ${describe(operation)}${detail}`, { cause });
    this.name = 'StorageUnavailableError';
    this.location = location;
    this.operation = operation;
  }
}

function describe(operation: StorageOperation): string {
  switch (operation) {
    case 'read':
      return 'read';
    case 'write':
      return 'written';
    case 'remove':
      return 'removed';
  }
}
