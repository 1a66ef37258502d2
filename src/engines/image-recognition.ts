/**
 * Template matching against captured screen buffers.
 *
 * Scores are zero-mean normalized cross-correlation over grayscale pixels,
 * clamped to [0, 1]. The search slides the template with a coarse stride,
 * then refines around the best coarse hit at 1px resolution.
 */
import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToLoop, setTimeout as sleep } from 'node:timers/promises';
import type { MatchResult } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import type { ScreenshotService } from './screenshot-service.js';
import { decodePNG, type GrayImage } from './png.js';

export interface ImageRecognitionOptions {
  /** Used when a caller passes no threshold. */
  defaultThreshold?: number;
  /** Screen source for the wait helpers. */
  screenshots?: ScreenshotService;
  pollIntervalMs?: number;
  /** Upper bound on template pixels sampled per comparison. */
  maxSamples?: number;
  logger?: Logger;
}

interface Samples {
  offsets: Int32Array; // (ty * screenWidth + tx) relative to match origin
  values: Float64Array; // template luma minus its mean
  norm: number; // sqrt(sum(values^2))
  mean: number;
}

// Rows scanned between yields, so concurrent runs keep the event loop
const ROWS_PER_YIELD = 16;

function notFound(searchDurationMs: number): MatchResult {
  return {
    found: false,
    confidence: 0,
    location: { x: 0, y: 0 },
    boundingBox: { x: 0, y: 0, width: 0, height: 0 },
    searchDurationMs,
  };
}

export class ImageRecognitionService {
  private readonly defaultThreshold: number;
  private readonly pollIntervalMs: number;
  private readonly maxSamples: number;

  constructor(private readonly options: ImageRecognitionOptions = {}) {
    this.defaultThreshold = options.defaultThreshold ?? 0.8;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.maxSamples = options.maxSamples ?? 1024;
  }

  /**
   * Find the best match of `template` inside `screen`.
   * `found` is true when the best confidence reaches `threshold`.
   */
  async findImage(screen: Buffer, template: Buffer, threshold = this.defaultThreshold): Promise<MatchResult> {
    const started = performance.now();
    const src = decodePNG(screen);
    const tpl = decodePNG(template);

    if (!src || !tpl) {
      this.options.logger?.warn('Failed to load screen or template image');
      return notFound(performance.now() - started);
    }
    if (tpl.width > src.width || tpl.height > src.height) {
      return notFound(performance.now() - started);
    }

    const samples = this.sampleTemplate(tpl, src.width);
    const stride = Math.max(1, Math.floor(Math.min(tpl.width, tpl.height) / 4));

    let bestX = 0;
    let bestY = 0;
    let bestScore = -1;
    let rows = 0;

    for (let y = 0; y <= src.height - tpl.height; y += stride) {
      for (let x = 0; x <= src.width - tpl.width; x += stride) {
        const score = this.score(src, samples, x, y);
        if (score > bestScore) {
          bestScore = score;
          bestX = x;
          bestY = y;
        }
      }
      if (++rows % ROWS_PER_YIELD === 0) await yieldToLoop();
    }

    if (stride > 1) {
      const refined = this.refine(src, samples, tpl, bestX, bestY, stride);
      bestX = refined.x;
      bestY = refined.y;
      bestScore = refined.score;
    }

    const confidence = Math.min(1, Math.max(0, bestScore));
    const result: MatchResult = {
      found: confidence >= threshold,
      confidence,
      location: { x: bestX, y: bestY },
      boundingBox: { x: bestX, y: bestY, width: tpl.width, height: tpl.height },
      searchDurationMs: performance.now() - started,
    };

    this.options.logger?.debug('Image matching completed', {
      found: result.found,
      confidence: Number(confidence.toFixed(3)),
      durationMs: Math.round(result.searchDurationMs),
    });
    return result;
  }

  /** Only the single best match is reported. */
  async findAllImages(screen: Buffer, template: Buffer, threshold = this.defaultThreshold): Promise<MatchResult[]> {
    const result = await this.findImage(screen, template, threshold);
    return result.found ? [result] : [];
  }

  async isImagePresent(screen: Buffer, template: Buffer, threshold = this.defaultThreshold): Promise<boolean> {
    return (await this.findImage(screen, template, threshold)).found;
  }

  /**
   * Poll the screen until the template appears or `timeoutMs` elapses.
   */
  async waitForImage(
    template: Buffer,
    timeoutMs: number,
    threshold = this.defaultThreshold,
    signal?: AbortSignal,
  ): Promise<MatchResult> {
    return this.poll(template, timeoutMs, threshold, signal, (r) => r.found, (r) => r);
  }

  /**
   * Poll the screen until the template is gone. `found` in the result means
   * the disappearance was observed.
   */
  async waitForImageDisappear(
    template: Buffer,
    timeoutMs: number,
    threshold = this.defaultThreshold,
    signal?: AbortSignal,
  ): Promise<MatchResult> {
    return this.poll(
      template,
      timeoutMs,
      threshold,
      signal,
      (r) => !r.found,
      (r) => ({ ...r, found: true }),
    );
  }

  private async poll(
    template: Buffer,
    timeoutMs: number,
    threshold: number,
    signal: AbortSignal | undefined,
    done: (result: MatchResult) => boolean,
    finish: (result: MatchResult) => MatchResult,
  ): Promise<MatchResult> {
    const screenshots = this.options.screenshots;
    if (!screenshots) {
      throw new Error('ImageRecognitionService needs a screenshot service to wait on the screen');
    }

    const started = performance.now();
    while (performance.now() - started < timeoutMs) {
      signal?.throwIfAborted();
      try {
        const screen = await screenshots.captureFullScreen();
        const result = await this.findImage(screen, template, threshold);
        if (done(result)) {
          return { ...finish(result), searchDurationMs: performance.now() - started };
        }
      } catch (error) {
        if (signal?.aborted) throw error;
        this.options.logger?.warn('Error while polling the screen for a template', { error });
      }
      await sleep(this.pollIntervalMs, undefined, { signal });
    }

    this.options.logger?.warn('Template wait timed out', { timeoutMs });
    return notFound(performance.now() - started);
  }

  private sampleTemplate(tpl: GrayImage, screenWidth: number): Samples {
    const total = tpl.width * tpl.height;
    const every = Math.max(1, Math.ceil(total / this.maxSamples));
    const count = Math.ceil(total / every);
    const offsets = new Int32Array(count);
    const values = new Float64Array(count);

    let n = 0;
    let sum = 0;
    for (let i = 0; i < total; i += every) {
      const tx = i % tpl.width;
      const ty = Math.floor(i / tpl.width);
      offsets[n] = ty * screenWidth + tx;
      values[n] = tpl.luma[i];
      sum += tpl.luma[i];
      n++;
    }

    const mean = sum / n;
    let sq = 0;
    for (let k = 0; k < n; k++) {
      values[k] -= mean;
      sq += values[k] * values[k];
    }

    return { offsets: offsets.subarray(0, n), values: values.subarray(0, n), norm: Math.sqrt(sq), mean };
  }

  private score(src: GrayImage, samples: Samples, x: number, y: number): number {
    const origin = y * src.width + x;
    const n = samples.offsets.length;

    let sum = 0;
    for (let k = 0; k < n; k++) sum += src.luma[origin + samples.offsets[k]];
    const mean = sum / n;

    let cross = 0;
    let sq = 0;
    for (let k = 0; k < n; k++) {
      const d = src.luma[origin + samples.offsets[k]] - mean;
      cross += d * samples.values[k];
      sq += d * d;
    }

    const srcNorm = Math.sqrt(sq);
    if (samples.norm === 0 || srcNorm === 0) {
      // Flat template or flat region: correlation is undefined, compare levels
      if (samples.norm === 0 && srcNorm === 0) {
        return 1 - Math.abs(mean - samples.mean) / 255;
      }
      return 0;
    }
    return cross / (samples.norm * srcNorm);
  }

  private refine(
    src: GrayImage,
    samples: Samples,
    tpl: GrayImage,
    coarseX: number,
    coarseY: number,
    stride: number,
  ): { x: number; y: number; score: number } {
    let best = { x: coarseX, y: coarseY, score: -1 };

    const minX = Math.max(0, coarseX - stride);
    const maxX = Math.min(src.width - tpl.width, coarseX + stride);
    const minY = Math.max(0, coarseY - stride);
    const maxY = Math.min(src.height - tpl.height, coarseY + stride);

    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const score = this.score(src, samples, x, y);
        if (score > best.score) best = { x, y, score };
      }
    }

    return best;
  }
}
