import { CollaboratorError, MalformedScriptError, ScriptNotFoundError } from './errors.js';

export type FaultKind =
  | 'Cancellation'
  | 'NotFound'
  | 'MalformedScript'
  | 'CollaboratorFailure'
  | 'Unexpected';

interface ClassifyContext {
  signal?: AbortSignal;
}

export function classifyFault(error: unknown, context: ClassifyContext = {}): FaultKind {
  if (isCancellation(error, context.signal)) {
    return 'Cancellation';
  }

  if (error instanceof ScriptNotFoundError) {
    return 'NotFound';
  }

  if (error instanceof MalformedScriptError || isZodError(error)) {
    return 'MalformedScript';
  }

  if (error instanceof CollaboratorError || isPlaywrightError(error)) {
    return 'CollaboratorFailure';
  }

  return 'Unexpected';
}

/**
 * Only a run whose own signal has aborted is cancelled. An AbortError raised
 * by a collaborator while the signal is still live is an ordinary fault.
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted !== true) return false;
  return error === signal.reason || (error instanceof Error && error.name === 'AbortError');
}

function isZodError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ZodError';
}

function isPlaywrightError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const text = error.message.toLowerCase();
  return (
    error.name === 'TimeoutError' ||
    text.includes('target page, context or browser has been closed') ||
    text.includes('browser has been closed')
  );
}
