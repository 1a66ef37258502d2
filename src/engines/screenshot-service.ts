import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ScreenRegion } from '../types/index.js';
import type { Logger } from '../logging/logger.js';

export interface ScreenshotService {
  captureFullScreen(): Promise<Buffer>;
  captureRegion(region: ScreenRegion): Promise<Buffer>;
  /** Writes PNG bytes under the screenshot directory and returns the path. */
  saveScreenshot(imageData: Buffer, fileName?: string): Promise<string>;
}

/**
 * Minimal page surface for capture. A Playwright `Page` satisfies it.
 */
export interface CaptureSurface {
  screenshot(options?: {
    type?: 'png' | 'jpeg';
    clip?: { x: number; y: number; width: number; height: number };
    fullPage?: boolean;
  }): Promise<Buffer>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `yyyyMMdd_HHmmss` in local time. */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class PlaywrightScreenshotService implements ScreenshotService {
  constructor(
    private surface: () => CaptureSurface,
    private screenshotDir: string,
    private logger?: Logger,
  ) {}

  async captureFullScreen(): Promise<Buffer> {
    return this.surface().screenshot({ type: 'png' });
  }

  async captureRegion(region: ScreenRegion): Promise<Buffer> {
    return this.surface().screenshot({
      type: 'png',
      clip: { x: region.x, y: region.y, width: region.width, height: region.height },
    });
  }

  async saveScreenshot(imageData: Buffer, fileName = ''): Promise<string> {
    let name = fileName || `screenshot_${formatTimestamp()}.png`;
    if (!name.toLowerCase().endsWith('.png')) {
      name += '.png';
    }

    await mkdir(this.screenshotDir, { recursive: true });
    const filePath = join(this.screenshotDir, name);
    await writeFile(filePath, imageData);
    this.logger?.info('Screenshot saved', { filePath });
    return filePath;
  }
}
