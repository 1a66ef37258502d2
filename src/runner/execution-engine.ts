import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type {
  AutomationScript,
  ExecutionLog,
  LogLevel,
  ScriptExecutionState,
} from '../types/index.js';
import { TERMINAL_STATUSES } from '../types/index.js';
import type { AutomationEngine } from '../engines/automation-engine.js';
import type { ImageRecognitionService } from '../engines/image-recognition.js';
import type { ScreenshotService } from '../engines/screenshot-service.js';
import type { ScriptStorage } from '../storage/script-storage.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { ScriptNotFoundError, errorMessage } from '../exception/errors.js';
import { ActionExecutor } from './action-executor.js';
import { ConditionEvaluator } from './condition-evaluator.js';
import { PauseGate } from './cancellation.js';
import type { RunContext } from './run-context.js';
import { ScriptRunner } from './script-runner.js';
import { StepExecutor } from './step-executor.js';

export const MAX_LOGS_PER_RUN = 1000;

export interface ExecutionEvents {
  logGenerated: (log: ExecutionLog) => void;
  stateChanged: (state: ScriptExecutionState) => void;
}

export interface ExecutionEngineDeps {
  storage: ScriptStorage;
  automation: AutomationEngine;
  screenshots: ScreenshotService;
  recognition: ImageRecognitionService;
  logger?: Logger;
}

interface RunHandle {
  state: ScriptExecutionState;
  controller: AbortController;
  gate: PauseGate;
  task: Promise<void>;
  settled: boolean;
}

/**
 * The one process-wide window override. Every run applies it before its
 * script's own preference and restores it when the run ends.
 */
export class TargetWindowOverride {
  private handle: string | null = null;

  get(): string | null {
    return this.handle;
  }

  set(handle: string | null): void {
    this.handle = handle;
  }
}

function isActive(state: ScriptExecutionState): boolean {
  return !TERMINAL_STATUSES.has(state.status);
}

/**
 * Runs scripts concurrently, one run per script id. Commands never throw for
 * expected conditions; callers follow progress through `logGenerated` and
 * `stateChanged`.
 */
export class ScriptExecutionEngine {
  private runs = new Map<string, RunHandle>();
  private emitter = new EventEmitter<ExecutionEvents>();
  private override = new TargetWindowOverride();
  private runner: ScriptRunner;
  private logger: Logger;

  constructor(private deps: ExecutionEngineDeps) {
    this.logger = (deps.logger ?? getLogger()).child({ component: 'execution-engine' });

    const conditions = new ConditionEvaluator(deps);
    const actions = new ActionExecutor(deps);
    this.runner = new ScriptRunner(new StepExecutor(conditions, actions), this.logger);
  }

  on<E extends EventEmitter.EventNames<ExecutionEvents>>(
    event: E,
    listener: EventEmitter.EventListener<ExecutionEvents, E>,
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<E extends EventEmitter.EventNames<ExecutionEvents>>(
    event: E,
    listener: EventEmitter.EventListener<ExecutionEvents, E>,
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Start `scriptId`, replacing any run of it still in flight. Resolves once
   * the new run is installed; the run itself continues in the background.
   */
  async start(scriptId: string): Promise<void> {
    let script: AutomationScript;
    try {
      const loaded = await this.deps.storage.getScript(scriptId);
      if (!loaded) throw new ScriptNotFoundError(scriptId);
      script = structuredClone(loaded);
    } catch (error) {
      this.emitLog(this.makeLog(scriptId, '', 'Error', `Failed to start script: ${errorMessage(error)}`));
      this.logger.error('Failed to start script', { scriptId, error });
      throw error;
    }

    for (let previous = this.runs.get(scriptId); previous && !previous.settled; previous = this.runs.get(scriptId)) {
      this.stop(scriptId);
      await previous.task;
    }

    const state: ScriptExecutionState = {
      scriptId,
      scriptName: script.name,
      currentStepId: script.steps[0]?.id ?? '',
      startTime: new Date().toISOString(),
      status: 'Running',
      logs: [],
      currentRepeat: 0,
      totalRepeats: script.infiniteRepeat ? null : script.repeatCount,
      isInfiniteRepeat: script.infiniteRepeat,
      variables: {},
    };

    const controller = new AbortController();
    const gate = new PauseGate();
    const ctx: RunContext = {
      script,
      state,
      signal: controller.signal,
      gate,
      log: (level, message, stepId = '') => this.log(state, level, message, stepId),
      emitState: () => this.emitState(state),
    };

    this.emitState(state);
    this.log(state, 'Info', `Script '${script.name}' started`);

    const run: RunHandle = { state, controller, gate, task: Promise.resolve(), settled: false };
    this.runs.set(scriptId, run);
    run.task = this.execute(ctx, run);
  }

  /** Idempotent; returns before the run has unwound. */
  stop(scriptId: string): void {
    const run = this.runs.get(scriptId);
    if (!run) {
      this.logger.warn('Stop requested for a script that is not tracked', { scriptId });
      return;
    }
    if (!isActive(run.state)) return;

    run.state.status = 'Stopped';
    this.emitState(run.state);
    this.log(run.state, 'Info', 'Script execution stopped');
    run.controller.abort();
    run.gate.open();

    void run.task.then(() => {
      this.logger.debug('Stopped run unwound', { scriptId, status: run.state.status });
    });
  }

  pause(scriptId: string): void {
    const run = this.runs.get(scriptId);
    if (!run || run.state.status !== 'Running') return;

    run.gate.close();
    run.state.status = 'Paused';
    this.emitState(run.state);
    this.log(run.state, 'Info', 'Script execution paused');
  }

  resume(scriptId: string): void {
    const run = this.runs.get(scriptId);
    if (!run || run.state.status !== 'Paused') return;

    run.state.status = 'Running';
    this.emitState(run.state);
    this.log(run.state, 'Info', 'Script execution resumed');
    run.gate.open();
  }

  getExecutionState(scriptId: string): ScriptExecutionState | undefined {
    const run = this.runs.get(scriptId);
    return run ? structuredClone(run.state) : undefined;
  }

  getAllExecutionStates(): ScriptExecutionState[] {
    return [...this.runs.values()].map((run) => structuredClone(run.state));
  }

  /** Set or clear the process-wide target window and apply it at once. */
  overrideTargetWindow(handle: string | null): void {
    this.override.set(handle);
    if (handle) {
      this.deps.automation.setTargetWindow(handle);
    } else {
      this.deps.automation.clearTargetWindow();
    }
  }

  /** Resolves when the current run of `scriptId` has finished, if any. */
  async whenIdle(scriptId: string): Promise<void> {
    await this.runs.get(scriptId)?.task;
  }

  /** Stop every active run and wait for all of them to unwind. */
  async stopAll(): Promise<void> {
    const runs = [...this.runs.entries()];
    for (const [scriptId, run] of runs) {
      if (isActive(run.state)) this.stop(scriptId);
    }
    await Promise.all(runs.map(([, run]) => run.task));
  }

  private async execute(ctx: RunContext, run: RunHandle): Promise<void> {
    const { script, state } = ctx;
    try {
      this.applyTargeting(script);
      await this.runner.run(ctx);
    } catch (error) {
      state.status = 'Error';
      this.log(state, 'Error', `Script execution failed: ${errorMessage(error)}`);
      this.logger.error('Script run failed', { scriptId: script.id, error });
    } finally {
      try {
        this.restoreTargeting();
      } catch (error) {
        this.logger.warn('Failed to restore window targeting', { scriptId: script.id, error });
      }
      run.settled = true;
      this.emitState(state);
      this.logger.debug('Run finished', { scriptId: script.id, status: state.status });
    }
  }

  private applyTargeting(script: AutomationScript): void {
    const handle =
      this.override.get() ?? (script.targetWindow?.enabled && script.targetWindow.handle ? script.targetWindow.handle : null);

    if (handle) {
      this.deps.automation.setTargetWindow(handle);
    } else {
      this.deps.automation.clearTargetWindow();
    }
  }

  private restoreTargeting(): void {
    const handle = this.override.get();
    if (handle) {
      this.deps.automation.setTargetWindow(handle);
    } else {
      this.deps.automation.clearTargetWindow();
    }
  }

  private makeLog(scriptId: string, stepId: string, level: LogLevel, message: string): ExecutionLog {
    return { id: randomUUID(), timestamp: new Date().toISOString(), scriptId, stepId, level, message };
  }

  private log(state: ScriptExecutionState, level: LogLevel, message: string, stepId = ''): void {
    const entry = this.makeLog(state.scriptId, stepId, level, message);
    state.logs.push(entry);
    if (state.logs.length > MAX_LOGS_PER_RUN) {
      state.logs.splice(0, state.logs.length - MAX_LOGS_PER_RUN);
    }
    this.emitLog(entry);
  }

  private emitLog(entry: ExecutionLog): void {
    for (const listener of this.emitter.listeners('logGenerated')) {
      try {
        listener({ ...entry });
      } catch (error) {
        this.logger.warn('logGenerated listener threw', { scriptId: entry.scriptId, error });
      }
    }
  }

  private emitState(state: ScriptExecutionState): void {
    const listeners = this.emitter.listeners('stateChanged');
    if (listeners.length === 0) return;

    for (const listener of listeners) {
      try {
        listener(structuredClone(state));
      } catch (error) {
        this.logger.warn('stateChanged listener threw', { scriptId: state.scriptId, error });
      }
    }
  }
}
