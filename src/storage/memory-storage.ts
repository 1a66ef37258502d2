import type { AutomationScript, TemplateImage } from '../types/index.js';
import { byName, type ScriptStorage } from './script-storage.js';

export interface InMemoryStorageSeed {
  scripts?: AutomationScript[];
  templates?: TemplateImage[];
}

export class InMemoryScriptStorage implements ScriptStorage {
  private scripts = new Map<string, AutomationScript>();
  private templates = new Map<string, TemplateImage>();

  constructor(seed: InMemoryStorageSeed = {}) {
    for (const script of seed.scripts ?? []) this.scripts.set(script.id, script);
    for (const template of seed.templates ?? []) this.templates.set(template.id, template);
  }

  async getScript(id: string): Promise<AutomationScript | null> {
    return this.scripts.get(id) ?? null;
  }

  async listScripts(): Promise<AutomationScript[]> {
    return [...this.scripts.values()].sort(byName);
  }

  async saveScript(script: AutomationScript): Promise<AutomationScript> {
    const saved = { ...script, modifiedAt: new Date().toISOString() };
    this.scripts.set(saved.id, saved);
    return saved;
  }

  async deleteScript(id: string): Promise<boolean> {
    return this.scripts.delete(id);
  }

  async getTemplateImage(id: string): Promise<TemplateImage | null> {
    return this.templates.get(id) ?? null;
  }

  async listTemplateImages(): Promise<TemplateImage[]> {
    return [...this.templates.values()].sort(byName);
  }

  async saveTemplateImage(template: TemplateImage): Promise<TemplateImage> {
    this.templates.set(template.id, template);
    return template;
  }

  async deleteTemplateImage(id: string): Promise<boolean> {
    return this.templates.delete(id);
  }
}
