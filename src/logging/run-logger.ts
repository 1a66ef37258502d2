import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionLog, ScriptExecutionState } from '../types/index.js';
import type { Logger } from './logger.js';

/**
 * Persists one run's execution logs as JSONL. `append` is synchronous and
 * queues the write, so it can sit directly behind the engine's log event.
 */
export class RunLogger {
  private logPath: string;
  private initialized = false;
  private queue: Promise<void> = Promise.resolve();
  private failures = 0;

  constructor(
    private runDir: string,
    private logger?: Logger,
  ) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  append(log: ExecutionLog): void {
    this.queue = this.queue
      .then(() => this.logEntry(log))
      .catch((error: unknown) => {
        this.failures++;
        this.logger?.warn('Failed to persist execution log', { logPath: this.logPath, error });
      });
  }

  async logEntry(log: ExecutionLog): Promise<void> {
    await this.ensureDir();
    await appendFile(this.logPath, JSON.stringify(log) + '\n', 'utf-8');
  }

  async saveState(state: ScriptExecutionState): Promise<void> {
    await this.ensureDir();
    const { logs: _logs, ...summary } = state;
    await writeFile(join(this.runDir, 'state.json'), JSON.stringify(summary, null, 2), 'utf-8');
  }

  /** Resolves once every queued `append` has been written or reported. */
  async flush(): Promise<void> {
    await this.queue;
  }

  getFailureCount(): number {
    return this.failures;
  }

  getRunDir(): string {
    return this.runDir;
  }
}
