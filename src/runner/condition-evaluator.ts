import type { ScriptCondition, ScriptStep } from '../types/index.js';
import type { ImageRecognitionService } from '../engines/image-recognition.js';
import type { ScreenshotService } from '../engines/screenshot-service.js';
import type { ScriptStorage } from '../storage/script-storage.js';
import { errorMessage } from '../exception/errors.js';
import { isCancellation } from '../exception/classifier.js';
import type { RunContext } from './run-context.js';
import { getParam, hasParam } from './params.js';

export interface ConditionDeps {
  storage: ScriptStorage;
  screenshots: ScreenshotService;
  recognition: ImageRecognitionService;
}

export class ConditionEvaluator {
  constructor(private deps: ConditionDeps) {}

  async evaluate(condition: ScriptCondition, step: ScriptStep, ctx: RunContext): Promise<boolean> {
    switch (condition.type.toLowerCase()) {
      case 'image_found':
        return this.imageFound(condition, step, ctx);
      case 'image_not_found':
        return !(await this.imageFound(condition, step, ctx));
      case 'timeout': {
        const timeoutMs = getParam(condition.parameters, 'timeoutMs', 'int', 5000);
        return Date.now() - Date.parse(ctx.state.startTime) >= timeoutMs;
      }
      case 'always':
        return true;
      case 'never':
        return false;
      default:
        ctx.log('Warning', `Unknown condition type: ${condition.type}`, step.id);
        return false;
    }
  }

  private async imageFound(condition: ScriptCondition, step: ScriptStep, ctx: RunContext): Promise<boolean> {
    const templateId = getParam(condition.parameters, 'templateImageId', 'string', '');
    if (!templateId) {
      ctx.log('Warning', 'Template image ID not specified in condition', step.id);
      return false;
    }

    try {
      const template = await this.deps.storage.getTemplateImage(templateId);
      if (!template) {
        ctx.log('Warning', `Template image ${templateId} not found`, step.id);
        return false;
      }
      if (template.imageData.length === 0) {
        ctx.log('Warning', `Template image ${templateId} has no image data`, step.id);
        return false;
      }

      const threshold = hasParam(condition.parameters, 'threshold')
        ? getParam(condition.parameters, 'threshold', 'number', template.matchThreshold)
        : template.matchThreshold;

      const screen = await this.deps.screenshots.captureFullScreen();
      ctx.signal.throwIfAborted();
      const result = await this.deps.recognition.findImage(screen, template.imageData, threshold);

      ctx.log(
        'Debug',
        `Image search result: Found=${result.found}, Confidence=${result.confidence.toFixed(3)}`,
        step.id,
      );
      return result.found;
    } catch (error) {
      if (isCancellation(error, ctx.signal)) throw error;
      ctx.log('Error', `Error evaluating image condition: ${errorMessage(error)}`, step.id);
      return false;
    }
  }
}
