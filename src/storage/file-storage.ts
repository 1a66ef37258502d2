import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { AutomationScript, TemplateImage } from '../types/index.js';
import { AutomationScriptSchema, TemplateMetadataSchema, type TemplateMetadata } from '../schemas/index.js';
import { MalformedScriptError } from '../exception/errors.js';
import type { Logger } from '../logging/logger.js';
import { byName, type ScriptStorage } from './script-storage.js';

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isSafeId(id: string): boolean {
  return SAFE_ID.test(id) && !id.includes('..');
}

function assertSafeId(id: string): void {
  if (!isSafeId(id)) {
    throw new MalformedScriptError(`Invalid storage id: ${id}`);
  }
}

/**
 * JSON documents on disk:
 *
 *   <dataDir>/scripts/<id>.json
 *   <dataDir>/templates/<id>.json   metadata
 *   <dataDir>/templates/<id>.png    image bytes
 */
export class FileScriptStorage implements ScriptStorage {
  private scriptsDir: string;
  private templatesDir: string;

  constructor(
    dataDir: string,
    private logger?: Logger,
  ) {
    this.scriptsDir = join(dataDir, 'scripts');
    this.templatesDir = join(dataDir, 'templates');
  }

  async getScript(id: string): Promise<AutomationScript | null> {
    // No document can be stored under an unsafe id, so it is simply unknown
    if (!isSafeId(id)) {
      this.logger?.debug('Script id cannot name a stored document', { scriptId: id });
      return null;
    }
    const raw = await this.readDocument(join(this.scriptsDir, `${id}.json`));
    if (raw === null) return null;

    const parsed = AutomationScriptSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn('Invalid script document', { scriptId: id, issues: parsed.error.issues });
      return null;
    }
    return parsed.data;
  }

  async listScripts(): Promise<AutomationScript[]> {
    const ids = await this.listIds(this.scriptsDir);
    const scripts = await Promise.all(ids.map((id) => this.getScript(id)));
    return scripts.filter((s): s is AutomationScript => s !== null).sort(byName);
  }

  async saveScript(script: AutomationScript): Promise<AutomationScript> {
    assertSafeId(script.id);
    const saved = AutomationScriptSchema.parse({ ...script, modifiedAt: new Date().toISOString() });
    await mkdir(this.scriptsDir, { recursive: true });
    await writeFile(join(this.scriptsDir, `${saved.id}.json`), JSON.stringify(saved, null, 2), 'utf-8');
    return saved;
  }

  async deleteScript(id: string): Promise<boolean> {
    assertSafeId(id);
    return this.remove(join(this.scriptsDir, `${id}.json`));
  }

  async getTemplateImage(id: string): Promise<TemplateImage | null> {
    if (!isSafeId(id)) {
      this.logger?.debug('Template id cannot name a stored document', { templateId: id });
      return null;
    }
    const raw = await this.readDocument(join(this.templatesDir, `${id}.json`));
    if (raw === null) return null;

    const parsed = TemplateMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn('Invalid template document', { templateId: id, issues: parsed.error.issues });
      return null;
    }

    const meta = parsed.data;
    const imagePath = meta.filePath || join(this.templatesDir, `${id}.png`);
    let imageData: Buffer;
    try {
      imageData = await readFile(imagePath);
    } catch (error) {
      // Metadata without bytes still resolves; matching reports the empty image
      this.logger?.warn('Template image file unreadable', { templateId: id, imagePath, error });
      imageData = Buffer.alloc(0);
    }

    return { ...meta, filePath: imagePath, imageData };
  }

  async listTemplateImages(): Promise<TemplateImage[]> {
    const ids = await this.listIds(this.templatesDir);
    const templates = await Promise.all(ids.map((id) => this.getTemplateImage(id)));
    return templates.filter((t): t is TemplateImage => t !== null).sort(byName);
  }

  async saveTemplateImage(template: TemplateImage): Promise<TemplateImage> {
    assertSafeId(template.id);
    await mkdir(this.templatesDir, { recursive: true });

    const filePath = join(this.templatesDir, `${template.id}.png`);
    await writeFile(filePath, template.imageData);

    const meta: TemplateMetadata = TemplateMetadataSchema.parse({
      id: template.id,
      name: template.name,
      filePath,
      createdAt: template.createdAt,
      captureRegion: template.captureRegion,
      matchThreshold: template.matchThreshold,
    });
    await writeFile(join(this.templatesDir, `${template.id}.json`), JSON.stringify(meta, null, 2), 'utf-8');

    return { ...meta, imageData: template.imageData };
  }

  async deleteTemplateImage(id: string): Promise<boolean> {
    assertSafeId(id);
    const removed = await this.remove(join(this.templatesDir, `${id}.json`));
    await this.remove(join(this.templatesDir, `${id}.png`));
    return removed;
  }

  private async readDocument(path: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (!isMissing(error)) {
        this.logger?.warn('Failed to read storage document', { path, error });
      }
      return null;
    }

    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch (error) {
      this.logger?.warn('Storage document is not valid JSON', { path, error });
      return null;
    }
  }

  private async listIds(dir: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    return names
      .filter((name) => extname(name) === '.json')
      .map((name) => basename(name, '.json'))
      .filter((id) => SAFE_ID.test(id));
  }

  private async remove(path: string): Promise<boolean> {
    try {
      await rm(path);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}
