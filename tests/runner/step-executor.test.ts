import { describe, it, expect, vi } from 'vitest';
import { StepExecutor } from '../../src/runner/step-executor.js';
import { ActionExecutor } from '../../src/runner/action-executor.js';
import { ConditionEvaluator } from '../../src/runner/condition-evaluator.js';
import { ImageRecognitionService } from '../../src/engines/image-recognition.js';
import { InMemoryScriptStorage } from '../../src/storage/memory-storage.js';
import {
  makeAction,
  makeCondition,
  makeContext,
  makeScript,
  makeStep,
  mockAutomation,
  mockScreenshots,
  silentLogger,
} from '../helpers.js';
import type { ScriptStep } from '../../src/types/index.js';

function setup(step: ScriptStep) {
  const automation = mockAutomation();
  const screenshots = mockScreenshots();
  const recognition = new ImageRecognitionService({ logger: silentLogger() });
  const conditions = new ConditionEvaluator({ storage: new InMemoryScriptStorage(), screenshots, recognition });
  const evaluate = vi.spyOn(conditions, 'evaluate');
  const executor = new StepExecutor(conditions, new ActionExecutor({ automation, screenshots }));
  const run = makeContext(makeScript({ steps: [step] }));
  return { automation, executor, evaluate, ...run };
}

describe('StepExecutor', () => {
  describe('condition steps', () => {
    it('runs actions when every AND condition holds', async () => {
      const step = makeStep({
        id: 'c',
        type: 'condition',
        conditions: [makeCondition('always'), makeCondition('always')],
        actions: [makeAction('click', { x: 1, y: 2 })],
      });
      const { executor, automation, ctx } = setup(step);

      const result = await executor.execute(step, ctx);

      expect(result).toMatchObject({ stepId: 'c', ok: true });
      expect(automation.click).toHaveBeenCalledWith(1, 2);
    });

    it('short-circuits on the first false AND condition', async () => {
      const step = makeStep({
        id: 'c',
        type: 'condition',
        conditions: [makeCondition('never'), makeCondition('always')],
        actions: [makeAction('click')],
      });
      const { executor, automation, evaluate, ctx } = setup(step);

      const result = await executor.execute(step, ctx);

      expect(result.ok).toBe(false);
      expect(evaluate).toHaveBeenCalledTimes(1);
      expect(automation.click).not.toHaveBeenCalled();
    });

    it('succeeds on a true OR condition after an earlier false one', async () => {
      const step = makeStep({
        id: 'c',
        type: 'condition',
        conditions: [makeCondition('never', {}, 'OR'), makeCondition('always', {}, 'or'), makeCondition('never')],
        actions: [makeAction('type', { text: 'x' })],
      });
      const { executor, automation, evaluate, ctx } = setup(step);

      const result = await executor.execute(step, ctx);

      expect(result.ok).toBe(true);
      expect(evaluate).toHaveBeenCalledTimes(2);
      expect(automation.typeText).toHaveBeenCalledWith('x');
    });

    it('treats a step with no conditions as met', async () => {
      const step = makeStep({ id: 'c', type: 'condition', actions: [makeAction('click')] });
      const { executor, automation, ctx } = setup(step);

      expect((await executor.execute(step, ctx)).ok).toBe(true);
      expect(automation.click).toHaveBeenCalledTimes(1);
    });
  });

  it('runs every action of an action step in order', async () => {
    const step = makeStep({
      id: 'a',
      type: 'Action',
      actions: [makeAction('click', { x: 1, y: 1 }), makeAction('type', { text: 'abc' })],
    });
    const { executor, automation, ctx } = setup(step);
    const order: string[] = [];
    automation.click.mockImplementation(async () => {
      order.push('click');
    });
    automation.typeText.mockImplementation(async () => {
      order.push('type');
    });

    const result = await executor.execute(step, ctx);

    expect(result.ok).toBe(true);
    expect(order).toEqual(['click', 'type']);
  });

  it('sleeps for a wait step', async () => {
    const step = makeStep({ id: 'w', type: 'wait', parameters: { milliseconds: 40 } });
    const { executor, ctx } = setup(step);
    const start = Date.now();

    const result = await executor.execute(step, ctx);

    expect(result.ok).toBe(true);
    expect(Date.now() - start).toBeGreaterThanOrEqual(35);
  });

  it('returns the jump target of a jump step', async () => {
    const step = makeStep({ id: 'j', type: 'jump', parameters: { targetStepId: 'start' } });
    const { executor, ctx } = setup(step);

    expect(await executor.execute(step, ctx)).toMatchObject({ stepId: 'j', ok: true, nextStepId: 'start' });
  });

  it('has no jump target when targetStepId is empty', async () => {
    const step = makeStep({ id: 'j', type: 'jump' });
    const { executor, ctx } = setup(step);

    const result = await executor.execute(step, ctx);
    expect(result.ok).toBe(true);
    expect(result.nextStepId).toBeUndefined();
  });

  it('warns and succeeds on an unknown step type', async () => {
    const step = makeStep({ id: 'u', type: 'loop' });
    const { executor, ctx, logs } = setup(step);

    expect((await executor.execute(step, ctx)).ok).toBe(true);
    expect(logs).toEqual([{ level: 'Warning', message: 'Unknown step type: loop', stepId: 'u' }]);
  });

  it('converts a thrown action error into a failed result', async () => {
    const step = makeStep({ id: 'a', type: 'action', actions: [makeAction('click')] });
    const { executor, automation, ctx, logs } = setup(step);
    automation.click.mockRejectedValueOnce(new Error('no display'));

    const result = await executor.execute(step, ctx);

    expect(result).toMatchObject({ stepId: 'a', ok: false, faulted: true, message: 'no display' });
    expect(logs.map((l) => `${l.level}: ${l.message}`)).toEqual([
      'Error: Error executing action click: no display',
      'Error: Error executing step: no display',
    ]);
  });

  it('treats an AbortError on a live run as a step fault', async () => {
    const step = makeStep({ id: 'a', type: 'action', actions: [makeAction('click')] });
    const { executor, automation, ctx } = setup(step);
    automation.click.mockRejectedValueOnce(Object.assign(new Error('driver aborted'), { name: 'AbortError' }));

    const result = await executor.execute(step, ctx);

    expect(result).toMatchObject({ stepId: 'a', ok: false, faulted: true, message: 'driver aborted' });
  });

  it('lets cancellation propagate', async () => {
    const step = makeStep({ id: 'w', type: 'wait', parameters: { milliseconds: 10_000 } });
    const { executor, ctx, controller, logs } = setup(step);

    const pending = executor.execute(step, ctx);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    expect(logs).toEqual([]);
  });
});
