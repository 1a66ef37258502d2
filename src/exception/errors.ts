export class ScriptNotFoundError extends Error {
  readonly scriptId: string;

  constructor(scriptId: string) {
    super(`Script with ID ${scriptId} not found`);
    this.name = 'ScriptNotFoundError';
    this.scriptId = scriptId;
  }
}

export class MalformedScriptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedScriptError';
  }
}

/**
 * Raised by a collaborator (automation engine, screenshot or matcher) when it
 * cannot perform the requested operation.
 */
export class CollaboratorError extends Error {
  readonly collaborator: string;

  constructor(collaborator: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
