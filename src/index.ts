export type * from './types/index.js';
export { TERMINAL_STATUSES } from './types/index.js';
export * from './schemas/index.js';

export { getEnv, resetEnv, resolvePaths, type Env, type RuntimePaths } from './config/env.js';
export { Logger, getLogger, type LoggerOptions } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';

export {
  ScriptNotFoundError,
  MalformedScriptError,
  CollaboratorError,
  errorMessage,
} from './exception/errors.js';
export { classifyFault, isCancellation, type FaultKind } from './exception/classifier.js';

export type { AutomationEngine } from './engines/automation-engine.js';
export {
  PlaywrightAutomationEngine,
  toKeyCombo,
  type InputSurface,
  type PlaywrightAutomationOptions,
} from './engines/playwright-automation.js';
export {
  PlaywrightScreenshotService,
  formatTimestamp,
  type ScreenshotService,
  type CaptureSurface,
} from './engines/screenshot-service.js';
export { ImageRecognitionService, type ImageRecognitionOptions } from './engines/image-recognition.js';
export { decodePNG, type GrayImage } from './engines/png.js';

export type { ScriptStorage } from './storage/script-storage.js';
export { FileScriptStorage } from './storage/file-storage.js';
export { InMemoryScriptStorage, type InMemoryStorageSeed } from './storage/memory-storage.js';

export {
  ScriptExecutionEngine,
  TargetWindowOverride,
  MAX_LOGS_PER_RUN,
  type ExecutionEngineDeps,
  type ExecutionEvents,
} from './runner/execution-engine.js';
export { MAX_TRANSITIONS_PER_ITERATION } from './runner/script-runner.js';
export { getParam, getEnumParam, hasParam, unwrapParam, type ParamKind } from './runner/params.js';
