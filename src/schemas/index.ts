export {
  ParamBagSchema,
  ScriptConditionSchema,
  ScriptActionSchema,
  ScriptStepSchema,
  TargetWindowPreferenceSchema,
  AutomationScriptSchema,
} from './script.schema.js';
export { ScreenRegionSchema, TemplateMetadataSchema } from './template.schema.js';
export type { TemplateMetadata } from './template.schema.js';
