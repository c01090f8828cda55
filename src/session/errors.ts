export class ClosedSessionError extends Error {
  constructor(public readonly operation: string) {
    super(`Session is closed: cannot ${operation} after the session has ended.`);
    this.name = 'ClosedSessionError';
  }
}

export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
  }
}

export class EmptyInputError extends Error {
  constructor(source: string) {
    super(`No items found in ${source}`);
    this.name = 'EmptyInputError';
  }
}
