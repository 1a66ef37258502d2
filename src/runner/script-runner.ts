import type { ExecutionStatus, ScriptStep, StepResult } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../exception/errors.js';
import { classifyFault, isCancellation } from '../exception/classifier.js';
import type { RunContext } from './run-context.js';
import type { StepExecutor } from './step-executor.js';
import { delay, yieldTurn } from './cancellation.js';

/** Transitions allowed in one pass over a script before the pass ends. */
export const MAX_TRANSITIONS_PER_ITERATION = 1000;

/** Step id to list position. The first step with a given id wins. */
export function indexSteps(steps: readonly ScriptStep[]): Map<string, number> {
  const index = new Map<string, number>();
  steps.forEach((step, position) => {
    if (!index.has(step.id)) index.set(step.id, position);
  });
  return index;
}

export class ScriptRunner {
  constructor(
    private stepExecutor: StepExecutor,
    private logger?: Logger,
  ) {}

  /**
   * Run the repeat loop to a terminal status. Never rejects.
   */
  async run(ctx: RunContext): Promise<ExecutionStatus> {
    const { script, state, signal } = ctx;
    const index = indexSteps(script.steps);
    const reportRepeats = script.infiniteRepeat || script.repeatCount > 1;

    state.totalRepeats = script.infiniteRepeat ? null : script.repeatCount;
    state.isInfiniteRepeat = script.infiniteRepeat;
    state.currentRepeat = 0;

    if (reportRepeats) {
      ctx.log(
        'Info',
        script.infiniteRepeat
          ? 'Starting infinite script execution'
          : `Starting script execution with ${script.repeatCount} repeat(s)`,
      );
    }

    try {
      while ((script.infiniteRepeat || state.currentRepeat < script.repeatCount) && !signal.aborted) {
        state.currentRepeat++;
        state.lastRepeatTime = new Date().toISOString();

        if (reportRepeats) {
          ctx.log(
            'Info',
            script.infiniteRepeat
              ? `Starting repeat #${state.currentRepeat}`
              : `Starting repeat ${state.currentRepeat}/${script.repeatCount}`,
          );
        }

        const ok = await this.runIteration(ctx, index);
        if (!ok) {
          ctx.log('Error', 'Script iteration failed, stopping execution');
          break;
        }

        if (!script.infiniteRepeat && state.currentRepeat >= script.repeatCount) break;

        if (script.delayBetweenRepeatsMs > 0) {
          if (reportRepeats) ctx.log('Info', `Waiting ${script.delayBetweenRepeatsMs}ms before next repeat`);
          await delay(script.delayBetweenRepeatsMs, signal);
        } else {
          await yieldTurn(signal);
        }

        ctx.emitState();
      }

      if (signal.aborted) return this.cancelled(ctx);

      state.status = 'Completed';
      ctx.log(
        'Info',
        script.infiniteRepeat
          ? `Script execution stopped after ${state.currentRepeat} repeats`
          : 'Script execution completed',
      );
      return 'Completed';
    } catch (error) {
      // Whatever unwinds a run after stop() ends it as Stopped
      const kind = classifyFault(error, { signal });
      if (kind === 'Cancellation' || signal.aborted) return this.cancelled(ctx);

      state.status = 'Error';
      ctx.log('Error', `Script execution failed: ${errorMessage(error)}`);
      this.logger?.error('Script run failed', { scriptId: script.id, kind, error });
      return 'Error';
    }
  }

  /**
   * One pass from the first step. Resolves false when an unexpected fault
   * escapes the step guard; cancellation rejects.
   */
  async runIteration(ctx: RunContext, index: Map<string, number>): Promise<boolean> {
    const steps = ctx.script.steps;
    let cursor = 0;
    let transitions = 0;

    try {
      while (cursor < steps.length && transitions < MAX_TRANSITIONS_PER_ITERATION && !ctx.signal.aborted) {
        await ctx.gate.wait(ctx.signal);

        const step = steps[cursor];
        if (!step.enabled) {
          cursor++;
          continue;
        }

        ctx.state.currentStepId = step.id;
        ctx.emitState();
        ctx.log('Info', `Executing step: ${step.name}`, step.id);

        const result = await this.stepExecutor.execute(step, ctx);
        cursor = this.nextCursor(ctx, step, result, cursor, index);
        transitions++;
      }
      return true;
    } catch (error) {
      if (ctx.signal.aborted || isCancellation(error, ctx.signal)) throw error;
      ctx.log('Error', `Error in script iteration: ${errorMessage(error)}`);
      return false;
    }
  }

  private nextCursor(
    ctx: RunContext,
    step: ScriptStep,
    result: StepResult,
    cursor: number,
    index: Map<string, number>,
  ): number {
    const steps = ctx.script.steps;

    if (result.ok) {
      if (!result.nextStepId) return cursor + 1;

      const target = index.get(result.nextStepId);
      if (target === undefined) {
        ctx.log('Warning', `Step ID ${result.nextStepId} not found, continuing to next step`, step.id);
        return cursor + 1;
      }
      ctx.log('Info', `Jumping to step: ${steps[target].name}`, step.id);
      return target;
    }

    if (!step.elseStepId) return cursor + 1;

    const target = index.get(step.elseStepId);
    if (target === undefined) {
      ctx.log('Warning', `Else step ID ${step.elseStepId} not found, continuing to next step`, step.id);
      return cursor + 1;
    }
    // A thrown step already logged its error; the else jump is taken quietly
    if (!result.faulted) ctx.log('Info', `Condition failed, jumping to else step: ${steps[target].name}`, step.id);
    return target;
  }

  private cancelled(ctx: RunContext): ExecutionStatus {
    ctx.state.status = 'Stopped';
    ctx.log('Info', `Script execution cancelled after ${ctx.state.currentRepeat} repeat(s)`);
    return 'Stopped';
  }
}
