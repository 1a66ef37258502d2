import type { AutomationScript, TemplateImage } from '../types/index.js';

/**
 * Persistence for scripts and template images. Lookups of unknown ids
 * resolve to `null`; callers decide whether that is an error.
 */
export interface ScriptStorage {
  getScript(id: string): Promise<AutomationScript | null>;
  /** Sorted by name. */
  listScripts(): Promise<AutomationScript[]>;
  /** Stamps `modifiedAt` and returns the stored copy. */
  saveScript(script: AutomationScript): Promise<AutomationScript>;
  deleteScript(id: string): Promise<boolean>;

  getTemplateImage(id: string): Promise<TemplateImage | null>;
  listTemplateImages(): Promise<TemplateImage[]>;
  saveTemplateImage(template: TemplateImage): Promise<TemplateImage>;
  deleteTemplateImage(id: string): Promise<boolean>;
}

export function byName(a: { name: string }, b: { name: string }): number {
  return a.name.localeCompare(b.name);
}
