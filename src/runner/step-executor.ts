import type { ScriptStep, StepResult } from '../types/index.js';
import { errorMessage } from '../exception/errors.js';
import { isCancellation } from '../exception/classifier.js';
import type { ActionExecutor } from './action-executor.js';
import type { ConditionEvaluator } from './condition-evaluator.js';
import type { RunContext } from './run-context.js';
import { delay } from './cancellation.js';
import { getParam } from './params.js';

export class StepExecutor {
  constructor(
    private conditions: ConditionEvaluator,
    private actions: ActionExecutor,
  ) {}

  /**
   * Run one step. Faults other than cancellation are logged and reported as
   * `ok: false` so the caller can follow the step's else branch.
   */
  async execute(step: ScriptStep, ctx: RunContext): Promise<StepResult> {
    const start = Date.now();

    try {
      const result = await this.executeOp(step, ctx);
      return { ...result, durationMs: Date.now() - start };
    } catch (error) {
      if (isCancellation(error, ctx.signal)) throw error;

      const message = errorMessage(error);
      ctx.log('Error', `Error executing step: ${message}`, step.id);
      return { stepId: step.id, ok: false, faulted: true, message, durationMs: Date.now() - start };
    }
  }

  private async executeOp(step: ScriptStep, ctx: RunContext): Promise<StepResult> {
    switch (step.type.toLowerCase()) {
      case 'condition':
        return this.executeCondition(step, ctx);
      case 'action':
        await this.runActions(step, ctx);
        return { stepId: step.id, ok: true };
      case 'wait':
        await delay(getParam(step.parameters, 'milliseconds', 'int', 1000), ctx.signal);
        return { stepId: step.id, ok: true };
      case 'jump': {
        const target = getParam(step.parameters, 'targetStepId', 'string', '');
        return target ? { stepId: step.id, ok: true, nextStepId: target } : { stepId: step.id, ok: true };
      }
      default:
        ctx.log('Warning', `Unknown step type: ${step.type}`, step.id);
        return { stepId: step.id, ok: true };
    }
  }

  private async executeCondition(step: ScriptStep, ctx: RunContext): Promise<StepResult> {
    let met = true;

    for (const condition of step.conditions) {
      const result = await this.conditions.evaluate(condition, step, ctx);
      if (condition.operator.toUpperCase() === 'OR') {
        if (result) {
          met = true;
          break;
        }
      } else if (!result) {
        met = false;
        break;
      }
    }

    if (met) await this.runActions(step, ctx);
    return { stepId: step.id, ok: met };
  }

  private async runActions(step: ScriptStep, ctx: RunContext): Promise<void> {
    for (const action of step.actions) {
      await this.actions.execute(action, step, ctx);
    }
  }
}
