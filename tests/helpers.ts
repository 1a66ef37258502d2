import { deflateSync } from 'node:zlib';
import { vi } from 'vitest';
import { Logger, type LogLevel as ProcessLogLevel } from '../src/logging/logger.js';
import { PauseGate } from '../src/runner/cancellation.js';
import type { RunContext } from '../src/runner/run-context.js';
import type { AutomationEngine } from '../src/engines/automation-engine.js';
import type { ScreenshotService } from '../src/engines/screenshot-service.js';
import type {
  AutomationScript,
  LogLevel,
  ScriptAction,
  ScriptCondition,
  ScriptExecutionState,
  ScriptStep,
  TemplateImage,
} from '../src/types/index.js';

// ── logging ────────────────────────────────────────

export function silentLogger(): Logger {
  return new Logger({ level: 'debug', sink: () => {} });
}

export interface CapturedLine {
  level: ProcessLogLevel;
  entry: Record<string, unknown>;
}

export function capturingLogger(): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger({
    level: 'debug',
    sink: (level, line) => {
      lines.push({ level, entry: JSON.parse(line) });
    },
  });
  return { logger, lines };
}

// ── PNG fixtures ───────────────────────────────────

const CHANNELS: Record<number, number> = { 0: 1, 2: 3, 4: 2, 6: 4 };

function chunk(type: string, data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length);
  // CRC is not checked by the decoder
  return Buffer.concat([length, Buffer.from(type, 'ascii'), data, Buffer.alloc(4)]);
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

export interface PngSpec {
  width: number;
  height: number;
  /** 0 gray, 2 RGB, 4 gray+alpha, 6 RGBA. Defaults to 0. */
  colorType?: 0 | 2 | 4 | 6;
  /** Channel values for the pixel at (x, y). */
  pixel: (x: number, y: number) => number[];
  /** Scanline filter per row, cycled. Defaults to [0]. */
  filters?: number[];
}

export function makePNG(options: PngSpec): Buffer {
  const colorType = options.colorType ?? 0;
  const bpp = CHANNELS[colorType];
  const filters = options.filters ?? [0];
  const rowBytes = options.width * bpp;

  const rows: number[][] = [];
  for (let y = 0; y < options.height; y++) {
    const row: number[] = [];
    for (let x = 0; x < options.width; x++) row.push(...options.pixel(x, y));
    rows.push(row);
  }

  const raw: number[] = [];
  rows.forEach((row, y) => {
    const filter = filters[y % filters.length];
    const prev = y > 0 ? rows[y - 1] : new Array<number>(rowBytes).fill(0);
    raw.push(filter);
    for (let i = 0; i < rowBytes; i++) {
      const left = i >= bpp ? row[i - bpp] : 0;
      const up = prev[i];
      const upLeft = i >= bpp ? prev[i - bpp] : 0;
      const predictor = [0, left, up, (left + up) >> 1, paeth(left, up, upLeft)][filter];
      raw.push((row[i] - predictor) & 0xff);
    }
  });

  const ihdr = Buffer.alloc(13);
  ihdr.writeUInt32BE(options.width, 0);
  ihdr.writeUInt32BE(options.height, 4);
  ihdr[8] = 8;
  ihdr[9] = colorType;

  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    chunk('IHDR', ihdr),
    chunk('IDAT', deflateSync(Buffer.from(raw))),
    chunk('IEND', Buffer.alloc(0)),
  ]);
}

/** Grayscale PNG from a luma function. */
export function grayPNG(width: number, height: number, luma: (x: number, y: number) => number): Buffer {
  return makePNG({ width, height, pixel: (x, y) => [luma(x, y)] });
}

// ── script fixtures ────────────────────────────────

export function makeAction(type: string, parameters: Record<string, unknown> = {}, delayAfterMs = 0): ScriptAction {
  return { type, parameters, delayAfterMs };
}

export function makeCondition(
  type: string,
  parameters: Record<string, unknown> = {},
  operator = 'AND',
): ScriptCondition {
  return { type, parameters, operator };
}

export function makeStep(overrides: Partial<ScriptStep> & Pick<ScriptStep, 'id'>): ScriptStep {
  return {
    order: 0,
    type: 'action',
    name: overrides.id,
    parameters: {},
    conditions: [],
    actions: [],
    enabled: true,
    ...overrides,
  };
}

export function makeScript(overrides: Partial<AutomationScript> = {}): AutomationScript {
  return {
    id: 'script-1',
    name: 'Test Script',
    description: '',
    createdAt: '2026-01-01T00:00:00.000Z',
    modifiedAt: '2026-01-01T00:00:00.000Z',
    steps: [],
    infiniteRepeat: false,
    repeatCount: 1,
    delayBetweenRepeatsMs: 0,
    ...overrides,
  };
}

export function makeTemplate(overrides: Partial<TemplateImage> = {}): TemplateImage {
  return {
    id: 'tpl-1',
    name: 'Button',
    filePath: '',
    imageData: Buffer.from([1, 2, 3]),
    createdAt: '2026-01-01T00:00:00.000Z',
    captureRegion: { x: 0, y: 0, width: 10, height: 10 },
    matchThreshold: 0.8,
    ...overrides,
  };
}

// ── collaborator mocks ─────────────────────────────

export function mockAutomation() {
  const automation = {
    click: vi.fn(async (_x: number, _y: number) => {}),
    doubleClick: vi.fn(async (_x: number, _y: number) => {}),
    rightClick: vi.fn(async (_x: number, _y: number) => {}),
    typeText: vi.fn(async (_text: string) => {}),
    sendKeys: vi.fn(async (_keys: string) => {}),
    wait: vi.fn(async (_ms: number, _signal?: AbortSignal) => {}),
    moveMouse: vi.fn(async (_x: number, _y: number) => {}),
    drag: vi.fn(async () => {}),
    getMousePosition: vi.fn(() => ({ x: 0, y: 0 })),
    setTargetWindow: vi.fn((_handle: string) => {}),
    clearTargetWindow: vi.fn(() => {}),
    hasTargetWindow: false,
  } satisfies AutomationEngine;
  return automation;
}

export function mockScreenshots() {
  const screenshots = {
    captureFullScreen: vi.fn(async (): Promise<Buffer> => Buffer.from('screen')),
    captureRegion: vi.fn(async (): Promise<Buffer> => Buffer.from('region')),
    saveScreenshot: vi.fn(async (_data: Buffer, fileName?: string) => `/shots/${fileName ?? 'shot'}.png`),
  } satisfies ScreenshotService;
  return screenshots;
}

// ── run context ────────────────────────────────────

export interface RecordedLog {
  level: LogLevel;
  message: string;
  stepId: string;
}

export function makeState(script: AutomationScript, overrides: Partial<ScriptExecutionState> = {}): ScriptExecutionState {
  return {
    scriptId: script.id,
    scriptName: script.name,
    currentStepId: script.steps[0]?.id ?? '',
    startTime: new Date().toISOString(),
    status: 'Running',
    logs: [],
    currentRepeat: 0,
    totalRepeats: script.infiniteRepeat ? null : script.repeatCount,
    isInfiniteRepeat: script.infiniteRepeat,
    variables: {},
    ...overrides,
  };
}

export function makeContext(
  script: AutomationScript,
  options: { controller?: AbortController; state?: Partial<ScriptExecutionState> } = {},
) {
  const controller = options.controller ?? new AbortController();
  const logs: RecordedLog[] = [];
  const emitState = vi.fn(() => {});
  const ctx = {
    script,
    state: makeState(script, options.state),
    signal: controller.signal,
    gate: new PauseGate(),
    log: (level: LogLevel, message: string, stepId = '') => {
      logs.push({ level, message, stepId });
    },
    emitState,
  } satisfies RunContext;
  return { ctx, logs, controller, emitState };
}

export function messages(logs: readonly { message: string }[]): string[] {
  return logs.map((l) => l.message);
}
