/**
 * Values a parameter bag may hold. Documents decoded from JSON or YAML can
 * leave node objects in the bag, so anything is accepted and coerced on read.
 */
export type ParamValue = unknown;

export type ParamBag = Record<string, ParamValue>;

export type StepType = 'condition' | 'action' | 'wait' | 'jump';

export type ConditionType = 'image_found' | 'image_not_found' | 'timeout' | 'always' | 'never';

export type ConditionOperator = 'AND' | 'OR';

export type ActionType =
  | 'click'
  | 'double_click'
  | 'right_click'
  | 'type'
  | 'key_press'
  | 'wait'
  | 'screenshot';

export interface ScriptCondition {
  /** One of {@link ConditionType}; other values evaluate to false with a warning. */
  type: string;
  parameters: ParamBag;
  operator: string;
}

export interface ScriptAction {
  /** One of {@link ActionType}; other values are skipped with a warning. */
  type: string;
  parameters: ParamBag;
  delayAfterMs: number;
}

export interface ScriptStep {
  id: string;
  /** Informational only. Traversal follows list position and explicit jumps. */
  order: number;
  /** One of {@link StepType}; other values are no-ops logged as warnings. */
  type: string;
  name: string;
  parameters: ParamBag;
  conditions: ScriptCondition[];
  actions: ScriptAction[];
  elseStepId?: string;
  enabled: boolean;
}

export interface TargetWindowPreference {
  handle: string;
  enabled: boolean;
}

export interface AutomationScript {
  id: string;
  name: string;
  description: string;
  createdAt: string;
  modifiedAt: string;
  steps: ScriptStep[];
  infiniteRepeat: boolean;
  repeatCount: number;
  delayBetweenRepeatsMs: number;
  targetWindow?: TargetWindowPreference;
}

export interface ScreenRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TemplateImage {
  id: string;
  name: string;
  filePath: string;
  imageData: Buffer;
  createdAt: string;
  captureRegion: ScreenRegion;
  /** Fraction in [0, 1], same scale as match confidence. */
  matchThreshold: number;
}
