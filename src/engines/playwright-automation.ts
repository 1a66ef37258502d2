import type { Point } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { CollaboratorError } from '../exception/errors.js';
import type { AutomationEngine } from './automation-engine.js';
import { delay } from '../runner/cancellation.js';

type MouseButton = 'left' | 'right' | 'middle';

/**
 * The slice of a Playwright `Page` used for input injection.
 */
export interface InputSurface {
  mouse: {
    click(x: number, y: number, options?: { button?: MouseButton; clickCount?: number; delay?: number }): Promise<void>;
    dblclick(x: number, y: number, options?: { button?: MouseButton; delay?: number }): Promise<void>;
    move(x: number, y: number, options?: { steps?: number }): Promise<void>;
    down(options?: { button?: MouseButton }): Promise<void>;
    up(options?: { button?: MouseButton }): Promise<void>;
  };
  keyboard: {
    type(text: string, options?: { delay?: number }): Promise<void>;
    press(key: string, options?: { delay?: number }): Promise<void>;
  };
}

export interface PlaywrightAutomationOptions {
  /** Delay between key strokes while typing. */
  typeDelayMs?: number;
  /** Intermediate mouse moves during a drag. */
  dragSteps?: number;
  logger?: Logger;
}

// Script key tokens to Playwright key names
const KEY_NAMES: Record<string, string> = {
  CTRL: 'Control',
  CONTROL: 'Control',
  ALT: 'Alt',
  SHIFT: 'Shift',
  WIN: 'Meta',
  META: 'Meta',
  CMD: 'Meta',
  ENTER: 'Enter',
  RETURN: 'Enter',
  TAB: 'Tab',
  ESC: 'Escape',
  ESCAPE: 'Escape',
  SPACE: 'Space',
  BACKSPACE: 'Backspace',
  BACK: 'Backspace',
  DELETE: 'Delete',
  DEL: 'Delete',
  INSERT: 'Insert',
  INS: 'Insert',
  HOME: 'Home',
  END: 'End',
  PAGEUP: 'PageUp',
  PGUP: 'PageUp',
  PAGEDOWN: 'PageDown',
  PGDN: 'PageDown',
  UP: 'ArrowUp',
  DOWN: 'ArrowDown',
  LEFT: 'ArrowLeft',
  RIGHT: 'ArrowRight',
};

const CONTROL_KEYS: Record<string, string> = {
  '\n': 'Enter',
  '\r': 'Enter',
  '\t': 'Tab',
  '\b': 'Backspace',
};

function toKeyName(token: string): string {
  const upper = token.trim().toUpperCase();
  if (KEY_NAMES[upper]) return KEY_NAMES[upper];
  if (/^F([1-9]|1[0-2])$/.test(upper)) return upper;
  return token.trim();
}

/**
 * Translate `CTRL+SHIFT+S` style combinations to Playwright's `Control+Shift+S`.
 * A lone `+` is kept as the plus key.
 */
export function toKeyCombo(keys: string): string {
  if (keys.trim() === '+') return '+';
  return keys
    .split('+')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(toKeyName)
    .join('+');
}

export class PlaywrightAutomationEngine implements AutomationEngine {
  private windows = new Map<string, InputSurface>();
  private target: string | null = null;
  private position: Point = { x: 0, y: 0 };
  private readonly typeDelayMs: number;
  private readonly dragSteps: number;

  constructor(
    private defaultSurface: InputSurface,
    private options: PlaywrightAutomationOptions = {},
  ) {
    this.typeDelayMs = options.typeDelayMs ?? 0;
    this.dragSteps = options.dragSteps ?? 10;
  }

  /** Make a page addressable as a target window under `handle`. */
  registerWindow(handle: string, surface: InputSurface): void {
    this.windows.set(handle, surface);
  }

  unregisterWindow(handle: string): void {
    this.windows.delete(handle);
    if (this.target === handle) this.target = null;
  }

  get hasTargetWindow(): boolean {
    return this.target !== null;
  }

  setTargetWindow(handle: string): void {
    this.target = handle;
    this.options.logger?.debug('Target window set', { handle });
  }

  clearTargetWindow(): void {
    this.target = null;
  }

  getMousePosition(): Point {
    return { ...this.position };
  }

  async click(x: number, y: number): Promise<void> {
    await this.currentSurface().mouse.click(x, y, { button: 'left' });
    this.position = { x, y };
  }

  async doubleClick(x: number, y: number): Promise<void> {
    await this.currentSurface().mouse.dblclick(x, y, { button: 'left' });
    this.position = { x, y };
  }

  async rightClick(x: number, y: number): Promise<void> {
    await this.currentSurface().mouse.click(x, y, { button: 'right' });
    this.position = { x, y };
  }

  async moveMouse(x: number, y: number): Promise<void> {
    await this.currentSurface().mouse.move(x, y);
    this.position = { x, y };
  }

  async drag(from: Point, to: Point): Promise<void> {
    const { mouse } = this.currentSurface();
    await mouse.move(from.x, from.y);
    await mouse.down({ button: 'left' });
    try {
      await mouse.move(to.x, to.y, { steps: this.dragSteps });
    } finally {
      await mouse.up({ button: 'left' });
    }
    this.position = { ...to };
  }

  async typeText(text: string): Promise<void> {
    const { keyboard } = this.currentSurface();
    let chunk = '';
    let previous = '';

    for (const ch of text) {
      const last = previous;
      previous = ch;
      const key = CONTROL_KEYS[ch];
      if (key === undefined) {
        chunk += ch;
        continue;
      }
      if (chunk) {
        await keyboard.type(chunk, { delay: this.typeDelayMs });
        chunk = '';
      }
      // \r\n is one line break
      if (ch === '\n' && last === '\r') continue;
      await keyboard.press(key);
    }

    if (chunk) await keyboard.type(chunk, { delay: this.typeDelayMs });
  }

  async sendKeys(keys: string): Promise<void> {
    const combo = toKeyCombo(keys);
    if (!combo) return;
    await this.currentSurface().keyboard.press(combo);
  }

  async wait(milliseconds: number, signal?: AbortSignal): Promise<void> {
    await delay(milliseconds, signal);
  }

  private currentSurface(): InputSurface {
    if (this.target === null) return this.defaultSurface;
    const surface = this.windows.get(this.target);
    if (!surface) {
      throw new CollaboratorError('automation', `Target window ${this.target} is not available`);
    }
    return surface;
  }
}
