import type { ParamBag } from './script.js';

export type ExecutionStatus = 'Running' | 'Paused' | 'Stopped' | 'Completed' | 'Error';

export type LogLevel = 'Debug' | 'Info' | 'Warning' | 'Error';

export interface ExecutionLog {
  id: string;
  timestamp: string;
  scriptId: string;
  /** Empty for script-level messages. */
  stepId: string;
  level: LogLevel;
  message: string;
}

export interface ScriptExecutionState {
  scriptId: string;
  scriptName: string;
  currentStepId: string;
  startTime: string;
  status: ExecutionStatus;
  logs: ExecutionLog[];
  currentRepeat: number;
  /** `null` while the script repeats without bound. */
  totalRepeats: number | null;
  isInfiniteRepeat: boolean;
  lastRepeatTime?: string;
  variables: ParamBag;
}

export interface StepResult {
  stepId: string;
  ok: boolean;
  nextStepId?: string;
  message?: string;
  /** Set when the step threw instead of evaluating to false. */
  faulted?: boolean;
  durationMs?: number;
}

export const TERMINAL_STATUSES: ReadonlySet<ExecutionStatus> = new Set([
  'Stopped',
  'Completed',
  'Error',
]);
