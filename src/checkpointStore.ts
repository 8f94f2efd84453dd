import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Diagnostics } from './diagnostics';
import { describeError, logState, logWarn } from './logger';
import { StrategyCheckpoint, strategyCheckpointSchema } from './strategy';

export const CHECKPOINT_VERSION = 1;
const CHECKPOINT_FILE = 'strategies.json';

const checkpointFileSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  savedAt: z.string(),
  strategies: z.array(strategyCheckpointSchema),
});

export type CheckpointFile = z.infer<typeof checkpointFileSchema>;

export interface CheckpointStoreOptions {
  dir: string;
  diagnostics: Diagnostics;
  attempts?: number;
  baseDelayMs?: number;
  // Fires when durability degrades or recovers.
  onDurabilityChange?: (degraded: boolean) => void;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Crash-recoverable strategy state. Every save writes a temp file and renames
 * it over the previous checkpoint, so a reader sees either the old file or
 * the new one. Failed saves are retried with exponential backoff; once all
 * attempts fail the store reports degraded durability until a save succeeds.
 */
export class CheckpointStore {
  private readonly attempts: number;
  private readonly baseDelayMs: number;
  private isDegraded = false;
  private lastSavedAt: string | null = null;

  constructor(private readonly opts: CheckpointStoreOptions) {
    this.attempts = Math.max(1, opts.attempts ?? 3);
    this.baseDelayMs = opts.baseDelayMs ?? 200;
  }

  get filePath(): string {
    return path.join(this.opts.dir, CHECKPOINT_FILE);
  }

  get degraded(): boolean {
    return this.isDegraded;
  }

  get savedAt(): string | null {
    return this.lastSavedAt;
  }

  async save(strategies: StrategyCheckpoint[], nowTs: number): Promise<boolean> {
    const body: CheckpointFile = {
      version: CHECKPOINT_VERSION,
      savedAt: new Date(nowTs).toISOString(),
      strategies,
    };
    const text = JSON.stringify(body, null, 2);

    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      try {
        await this.writeAtomic(text);
        this.lastSavedAt = body.savedAt;
        if (this.isDegraded) logState('Checkpoint durability restored');
        this.setDegraded(false);
        return true;
      } catch (err) {
        this.opts.diagnostics.increment('checkpointFailures');
        logWarn('Checkpoint write failed', { attempt, of: this.attempts, error: describeError(err) });
        if (attempt < this.attempts) await sleep(this.baseDelayMs * 2 ** (attempt - 1));
      }
    }

    if (!this.isDegraded) logWarn('Checkpoint durability degraded; live tracking continues');
    this.setDegraded(true);
    return false;
  }

  // Missing file means a fresh start; an unreadable one is logged and skipped.
  load(): StrategyCheckpoint[] {
    if (!fs.existsSync(this.filePath)) return [];
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      const parsed = checkpointFileSchema.parse(raw);
      logState('Checkpoint loaded', { strategies: parsed.strategies.length, savedAt: parsed.savedAt });
      return parsed.strategies;
    } catch (err) {
      logWarn('Checkpoint unreadable, starting empty', { filePath: this.filePath, error: describeError(err) });
      return [];
    }
  }

  private setDegraded(degraded: boolean): void {
    if (this.isDegraded === degraded) return;
    this.isDegraded = degraded;
    this.opts.onDurabilityChange?.(degraded);
  }

  private async writeAtomic(text: string): Promise<void> {
    await fs.promises.mkdir(this.opts.dir, { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmp, text, 'utf8');
    await fs.promises.rename(tmp, this.filePath);
  }
}
