import type { AutomationScript, LogLevel, ScriptExecutionState } from '../types/index.js';
import type { PauseGate } from './cancellation.js';

/**
 * Everything a step needs from the run that owns it. The state object belongs
 * to this run only; a later run of the same script gets a fresh one.
 */
export interface RunContext {
  readonly script: AutomationScript;
  readonly state: ScriptExecutionState;
  readonly signal: AbortSignal;
  readonly gate: PauseGate;
  log(level: LogLevel, message: string, stepId?: string): void;
  emitState(): void;
}
