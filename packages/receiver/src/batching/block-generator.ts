import { NOOP_LOGGER, type ReplayLogger } from "@shardstream/replay";
import { toError } from "../errors";
import type { AccountingLock } from "../lock";
import { RateLimiter } from "./rate-limiter";
import type { BatchingEngine, BatchingListener } from "./types";

export interface BlockGeneratorOptions<T, M> {
  receiverId: string;
  /** Shared with the owner of the accounting state */
  lock: AccountingLock;
  listener: BatchingListener<T, M>;
  /** Seal the open block this often (default: 200ms) */
  batchIntervalMs?: number;
  /** Seal early once the open block holds this many items (default: 1000) */
  maxBatchRecords?: number;
  rateLimiter?: RateLimiter;
  logger?: ReplayLogger;
}

type GeneratorState = "initialized" | "active" | "stopping" | "stopped";

interface SealedBlock<T> {
  batchId: string;
  items: readonly T[];
}

const DEFAULT_BATCH_INTERVAL_MS = 200;
const DEFAULT_MAX_BATCH_RECORDS = 1000;

/**
 * Groups added items into blocks on a timer and pushes sealed blocks to the
 * listener strictly one after another. After a failed push no further
 * blocks are pushed; the failure goes to `onError`.
 */
export class BlockGenerator<T, M> implements BatchingEngine<T, M> {
  private readonly options: BlockGeneratorOptions<T, M>;
  private readonly logger: ReplayLogger;
  private readonly rateLimiter: RateLimiter;
  private readonly batchIntervalMs: number;
  private readonly maxBatchRecords: number;

  private state: GeneratorState = "initialized";
  private currentItems: T[] = [];
  private blockCount = 0;
  private readonly pending: SealedBlock<T>[] = [];
  private pushLoop: Promise<void> | null = null;
  private pushFailed = false;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: BlockGeneratorOptions<T, M>) {
    this.options = options;
    this.logger = options.logger ?? NOOP_LOGGER;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.batchIntervalMs = options.batchIntervalMs ?? DEFAULT_BATCH_INTERVAL_MS;
    this.maxBatchRecords = options.maxBatchRecords ?? DEFAULT_MAX_BATCH_RECORDS;
  }

  start(): void {
    if (this.state !== "initialized") {
      throw new Error(`Cannot start BlockGenerator as it is ${this.state}`);
    }
    this.state = "active";
    this.timer = setInterval(() => this.onTimer(), this.batchIntervalMs);
    this.logger.debug("block generator started", { batchIntervalMs: this.batchIntervalMs });
  }

  async stop(): Promise<void> {
    if (this.state !== "active") {
      return;
    }
    this.state = "stopping";
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    await this.options.lock.runExclusive(() => this.sealLocked());
    while (this.pushLoop) await this.pushLoop;
    this.state = "stopped";
    this.logger.debug("block generator stopped", { blocks: this.blockCount });
  }

  addWithMetadata(item: T, metadata: M): Promise<void> {
    return this.addMultipleWithMetadata([item], metadata);
  }

  async addMultipleWithMetadata(items: readonly T[], metadata: M): Promise<void> {
    this.assertActive();
    await this.rateLimiter.acquire(items.length);

    await this.options.lock.runExclusive(() => {
      // stop() may have run while we waited for tokens or the lock
      this.assertActive();
      for (const item of items) this.currentItems.push(item);
      this.options.listener.onAddData(items, metadata);
      if (this.currentItems.length >= this.maxBatchRecords) {
        this.sealLocked();
      }
    });
  }

  getCurrentLimit(): number {
    return this.rateLimiter.getCurrentLimit();
  }

  private assertActive(): void {
    if (this.state !== "active") {
      throw new Error(`Cannot add data as BlockGenerator is ${this.state}`);
    }
  }

  private onTimer(): void {
    this.options.lock
      .runExclusive(() => this.sealLocked())
      .catch((err: unknown) => this.reportError("Error sealing block", err));
  }

  /** Caller holds the accounting lock. */
  private sealLocked(): void {
    if (!this.currentItems.length) {
      return;
    }

    const batchId = `input-${this.options.receiverId}-${this.blockCount}`;
    this.blockCount += 1;
    const items = this.currentItems;
    this.currentItems = [];
    this.options.listener.onGenerateBlock(batchId);
    this.pending.push({ batchId, items });
    this.schedulePush();
  }

  private schedulePush(): void {
    if (this.pushLoop || this.pushFailed) {
      return;
    }
    this.pushLoop = this.drainPending().finally(() => {
      this.pushLoop = null;
      // a block may have been sealed after the loop saw an empty queue
      if (this.pending.length) this.schedulePush();
    });
  }

  private async drainPending(): Promise<void> {
    while (!this.pushFailed) {
      const block = this.pending.shift();
      if (!block) {
        return;
      }
      try {
        await this.options.listener.onPushBlock(block.batchId, block.items);
      } catch (err) {
        this.pushFailed = true;
        this.reportError(`Error pushing block ${block.batchId}`, err);
      }
    }
  }

  private reportError(message: string, err: unknown): void {
    this.logger.error(message, { err: toError(err).message });
    this.options.listener.onError(message, toError(err));
  }
}
