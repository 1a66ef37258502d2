#!/usr/bin/env node
/**
 * CLI: run a stored script, streaming engine events as JSONL on stdout.
 *
 * Usage: echo '{"scriptId":"daily-report"}' | macro-run
 *
 * Scripts and templates are read from MACRO_DATA_DIR. The browser page stands
 * in for the desktop: clicks, keys and screenshots all go to it. The run stops
 * on SIGINT or when `options.timeoutMs` elapses.
 */

import { join } from 'node:path';
import { chromium, type Browser } from 'playwright';
import { z } from 'zod';

import { getEnv, resolvePaths } from '../config/env.js';
import { getLogger } from '../logging/logger.js';
import { RunLogger } from '../logging/run-logger.js';
import { ImageRecognitionService } from '../engines/image-recognition.js';
import { PlaywrightAutomationEngine } from '../engines/playwright-automation.js';
import { PlaywrightScreenshotService } from '../engines/screenshot-service.js';
import { FileScriptStorage } from '../storage/file-storage.js';
import { ScriptExecutionEngine } from '../runner/execution-engine.js';
import { errorMessage } from '../exception/errors.js';
import type { ScriptExecutionState } from '../types/index.js';

const InputSchema = z.object({
  scriptId: z.string().min(1),
  options: z
    .object({
      url: z.string().url().optional(),
      headless: z.boolean().default(true),
      targetWindow: z.string().min(1).optional(),
      timeoutMs: z.number().int().nonnegative().default(120_000),
    })
    .default({}),
});

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function withoutLogs(state: ScriptExecutionState): Omit<ScriptExecutionState, 'logs'> {
  const { logs: _logs, ...rest } = state;
  return rest;
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const env = getEnv();
  const paths = resolvePaths(env);
  const logger = getLogger().child({ component: 'cli' });

  // 1. Read the request from stdin
  let input: z.infer<typeof InputSchema>;
  try {
    input = InputSchema.parse(JSON.parse(await readStdin()));
  } catch (err) {
    emit({ type: 'run_error', error: `Invalid input on stdin: ${errorMessage(err)}` });
    process.exitCode = 1;
    return;
  }

  const { scriptId, options } = input;

  // 2. Launch browser
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: options.headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
  } catch (err) {
    emit({ type: 'run_error', error: `Browser launch failed: ${errorMessage(err)}` });
    process.exitCode = 1;
    return;
  }

  let timer: NodeJS.Timeout | undefined;
  let onSigint: (() => void) | undefined;

  try {
    const page = await browser.newPage();
    if (options.url) {
      await page.goto(options.url, { waitUntil: 'domcontentloaded' });
    }

    // 3. Wire services
    const storage = new FileScriptStorage(paths.dataDir, logger);
    const screenshots = new PlaywrightScreenshotService(() => page, paths.screenshotDir, logger);
    const recognition = new ImageRecognitionService({
      defaultThreshold: env.MACRO_DEFAULT_THRESHOLD,
      screenshots,
      logger,
    });
    const automation = new PlaywrightAutomationEngine(page, { logger });
    if (options.targetWindow) {
      automation.registerWindow(options.targetWindow, page);
    }

    const engine = new ScriptExecutionEngine({ storage, automation, screenshots, recognition, logger });
    const runLogger = new RunLogger(join(paths.logDir, scriptId), logger);

    engine.on('logGenerated', (log) => {
      emit({ type: 'log', log });
      runLogger.append(log);
    });
    engine.on('stateChanged', (state) => {
      emit({ type: 'state', state: withoutLogs(state) });
    });

    if (options.targetWindow) {
      engine.overrideTargetWindow(options.targetWindow);
    }

    const stop = (): void => engine.stop(scriptId);
    onSigint = stop;
    process.once('SIGINT', stop);
    if (options.timeoutMs > 0) {
      timer = setTimeout(() => {
        emit({ type: 'run_timeout', timeoutMs: options.timeoutMs });
        stop();
      }, options.timeoutMs);
    }

    // 4. Run to completion
    await engine.start(scriptId);
    await engine.whenIdle(scriptId);

    const finalState = engine.getExecutionState(scriptId);
    await runLogger.flush();
    if (finalState) {
      await runLogger.saveState(finalState);
    }

    emit({
      type: 'run_complete',
      status: finalState?.status ?? 'Error',
      repeats: finalState?.currentRepeat ?? 0,
      logDir: runLogger.getRunDir(),
    });
    if (!finalState || finalState.status === 'Error') {
      process.exitCode = 1;
    }
  } catch (err) {
    emit({ type: 'run_error', error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    if (timer) clearTimeout(timer);
    if (onSigint) process.off('SIGINT', onSigint);
    await browser.close().catch((err: unknown) => {
      logger.warn('Failed to close browser', { error: err });
    });
  }
}

main().catch((err: unknown) => {
  emit({ type: 'run_error', error: errorMessage(err) });
  process.exitCode = 1;
});
