import type { ScriptAction, ScriptStep } from '../types/index.js';
import type { AutomationEngine } from '../engines/automation-engine.js';
import { formatTimestamp, type ScreenshotService } from '../engines/screenshot-service.js';
import { errorMessage } from '../exception/errors.js';
import { isCancellation } from '../exception/classifier.js';
import type { RunContext } from './run-context.js';
import { delay } from './cancellation.js';
import { getParam } from './params.js';

export interface ActionDeps {
  automation: AutomationEngine;
  screenshots: ScreenshotService;
}

export class ActionExecutor {
  constructor(private deps: ActionDeps) {}

  /**
   * Perform one action, then sleep its `delayAfterMs`. Failures are logged
   * against the step and rethrown.
   */
  async execute(action: ScriptAction, step: ScriptStep, ctx: RunContext): Promise<void> {
    try {
      await this.perform(action, step, ctx);
      if (action.delayAfterMs > 0) {
        await delay(action.delayAfterMs, ctx.signal);
      }
    } catch (error) {
      if (isCancellation(error, ctx.signal)) throw error;
      ctx.log('Error', `Error executing action ${action.type}: ${errorMessage(error)}`, step.id);
      throw error;
    }
  }

  private async perform(action: ScriptAction, step: ScriptStep, ctx: RunContext): Promise<void> {
    const params = action.parameters;
    const { automation, screenshots } = this.deps;

    switch (action.type.toLowerCase()) {
      case 'click': {
        const x = getParam(params, 'x', 'int', 0);
        const y = getParam(params, 'y', 'int', 0);
        await automation.click(x, y);
        ctx.log('Info', `Clicked at (${x}, ${y})`, step.id);
        return;
      }
      case 'double_click': {
        const x = getParam(params, 'x', 'int', 0);
        const y = getParam(params, 'y', 'int', 0);
        await automation.doubleClick(x, y);
        ctx.log('Info', `Double-clicked at (${x}, ${y})`, step.id);
        return;
      }
      case 'right_click': {
        const x = getParam(params, 'x', 'int', 0);
        const y = getParam(params, 'y', 'int', 0);
        await automation.rightClick(x, y);
        ctx.log('Info', `Right-clicked at (${x}, ${y})`, step.id);
        return;
      }
      case 'type': {
        const text = getParam(params, 'text', 'string', '');
        await automation.typeText(text);
        ctx.log('Info', `Typed text: ${text}`, step.id);
        return;
      }
      case 'key_press': {
        const keys = getParam(params, 'keys', 'string', '');
        await automation.sendKeys(keys);
        ctx.log('Info', `Sent keys: ${keys}`, step.id);
        return;
      }
      case 'wait': {
        const ms = getParam(params, 'milliseconds', 'int', 1000);
        await automation.wait(ms, ctx.signal);
        ctx.log('Info', `Waited ${ms}ms`, step.id);
        return;
      }
      case 'screenshot': {
        const fileName = getParam(params, 'fileName', 'string', '') || `script_screenshot_${formatTimestamp()}`;
        const image = await screenshots.captureFullScreen();
        const path = await screenshots.saveScreenshot(image, fileName);
        ctx.log('Info', `Screenshot saved: ${path}`, step.id);
        return;
      }
      default:
        ctx.log('Warning', `Unknown action type: ${action.type}`, step.id);
    }
  }
}
