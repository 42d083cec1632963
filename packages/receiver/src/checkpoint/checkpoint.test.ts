import type { ReplayLogger, SequenceRange } from "@shardstream/replay";
import { afterEach, describe, expect, it, vi } from "vitest";
import { LatestStoredSequences } from "../accounting/latest-stored";
import { PersistentCheckpointHandle } from "./handle";
import { InMemoryShardCheckpointStore } from "./store";
import { CheckpointTracker } from "./tracker";
import type { CheckpointHandle } from "./types";

const stored = (shardId: string, fromSeq: string, toSeq: string): SequenceRange => ({
  streamName: "orders",
  shardId,
  fromSeq,
  toSeq,
  recordCount: Number(toSeq) - Number(fromSeq) + 1,
});

function recordingHandle(failures = 0) {
  const calls: string[] = [];
  let remainingFailures = failures;
  const handle: CheckpointHandle = {
    checkpointAt: async (sequenceNumber) => {
      calls.push(sequenceNumber);
      if (remainingFailures > 0) {
        remainingFailures -= 1;
        throw new Error("lease table unavailable");
      }
    },
  };
  return { calls, handle };
}

const silentLogger = (): ReplayLogger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("CheckpointTracker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("checkpoints only once a shard has stored data", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const shardA = recordingHandle();
    const shardB = recordingHandle();
    tracker.setHandle("shardA", shardA.handle);
    tracker.setHandle("shardB", shardB.handle);

    await tracker.checkpointAll();
    expect(shardA.calls).toEqual([]);

    latest.record(stored("shardA", "100", "105"));
    await tracker.checkpointAll();

    expect(shardA.calls).toEqual(["105"]);
    expect(shardB.calls).toEqual([]);
    expect(tracker.getLastCheckpointed("shardA")).toBe("105");
  });

  it("skips shards whose stored sequence number did not move", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const { calls, handle } = recordingHandle();
    tracker.setHandle("shardA", handle);

    latest.record(stored("shardA", "100", "105"));
    await tracker.checkpointAll();
    await tracker.checkpointAll();
    latest.record(stored("shardA", "106", "110"));
    await tracker.checkpointAll();

    expect(calls).toEqual(["105", "110"]);
  });

  it("retries a failed checkpoint on the next cycle", async () => {
    const latest = new LatestStoredSequences();
    const logger = silentLogger();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000, logger });
    const { calls, handle } = recordingHandle(1);
    tracker.setHandle("shardA", handle);
    latest.record(stored("shardA", "100", "105"));

    await tracker.checkpointAll();
    expect(tracker.getLastCheckpointed("shardA")).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("failed to checkpoint shard", {
      shardId: "shardA",
      sequenceNumber: "105",
      err: "lease table unavailable",
    });

    await tracker.checkpointAll();
    expect(calls).toEqual(["105", "105"]);
    expect(tracker.getLastCheckpointed("shardA")).toBe("105");
  });

  it("joins a running cycle instead of starting another", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    let release = (): void => undefined;
    const calls: string[] = [];
    tracker.setHandle("shardA", {
      checkpointAt: (sequenceNumber) => {
        calls.push(sequenceNumber);
        return new Promise<void>((resolve) => {
          release = resolve;
        });
      },
    });
    latest.record(stored("shardA", "100", "105"));

    const first = tracker.checkpointAll();
    const second = tracker.checkpointAll();
    release();
    await Promise.all([first, second]);

    expect(second).toBe(first);
    expect(calls).toEqual(["105"]);
  });

  it("issues a final checkpoint when a handle is removed", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const { calls, handle } = recordingHandle();
    tracker.setHandle("shardA", handle);
    latest.record(stored("shardA", "100", "105"));

    await tracker.removeHandle("shardA", handle);

    expect(calls).toEqual(["105"]);
    expect(tracker.trackedShards()).toEqual([]);
    expect(tracker.getLastCheckpointed("shardA")).toBeUndefined();
  });

  it("does not repeat the last checkpoint on removal", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const { calls, handle } = recordingHandle();
    tracker.setHandle("shardA", handle);
    latest.record(stored("shardA", "100", "105"));
    await tracker.checkpointAll();

    await tracker.removeHandle("shardA", handle);

    expect(calls).toEqual(["105"]);
  });

  it("lets a removal wait for a checkpoint already in flight on the shard", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const calls: string[] = [];
    let release = (): void => undefined;
    const leaseWrite = new Promise<void>((resolve) => {
      release = resolve;
    });
    const leased: CheckpointHandle = {
      checkpointAt: async (sequenceNumber) => {
        calls.push(`old:${sequenceNumber}`);
        await leaseWrite;
      },
    };
    const closing: CheckpointHandle = {
      checkpointAt: async (sequenceNumber) => {
        calls.push(`final:${sequenceNumber}`);
      },
    };
    tracker.setHandle("shardA", leased);
    latest.record(stored("shardA", "100", "105"));

    const cycle = tracker.checkpointAll();
    const removal = tracker.removeHandle("shardA", closing);
    release();
    await Promise.all([cycle, removal]);

    expect(calls).toEqual(["old:105"]);
    expect(tracker.getLastCheckpointed("shardA")).toBeUndefined();

    const fresh = recordingHandle();
    tracker.setHandle("shardA", fresh.handle);
    await tracker.checkpointAll();

    expect(fresh.calls).toEqual(["105"]);
  });

  it("drops a shard without checkpointing when the lease was lost", async () => {
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const { calls, handle } = recordingHandle();
    tracker.setHandle("shardA", handle);
    latest.record(stored("shardA", "100", "105"));

    await tracker.removeHandle("shardA", null);
    await tracker.checkpointAll();

    expect(calls).toEqual([]);
    expect(tracker.trackedShards()).toEqual([]);
  });

  it("swallows a failed final checkpoint after logging it", async () => {
    const latest = new LatestStoredSequences();
    const logger = silentLogger();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000, logger });
    const { calls, handle } = recordingHandle(1);
    tracker.setHandle("shardA", handle);
    latest.record(stored("shardA", "100", "105"));

    await expect(tracker.removeHandle("shardA", handle)).resolves.toBeUndefined();

    expect(calls).toEqual(["105"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("checkpoints on its interval and once more when stopped", async () => {
    vi.useFakeTimers();
    const latest = new LatestStoredSequences();
    const tracker = new CheckpointTracker({ latest, intervalMs: 1000 });
    const { calls, handle } = recordingHandle();
    tracker.setHandle("shardA", handle);
    tracker.start();

    latest.record(stored("shardA", "100", "105"));
    await vi.advanceTimersByTimeAsync(999);
    expect(calls).toEqual([]);
    await vi.advanceTimersByTimeAsync(1);
    expect(calls).toEqual(["105"]);

    latest.record(stored("shardA", "106", "107"));
    await tracker.stop();
    expect(calls).toEqual(["105", "107"]);

    await vi.advanceTimersByTimeAsync(5000);
    expect(calls).toEqual(["105", "107"]);
  });
});

describe("PersistentCheckpointHandle", () => {
  it("never moves the persisted checkpoint backwards", async () => {
    const store = new InMemoryShardCheckpointStore();
    const handle = new PersistentCheckpointHandle(store, "orders", "shardA");

    await handle.checkpointAt("105");
    await handle.checkpointAt("103");
    await handle.checkpointAt("105");
    await handle.checkpointAt("110");

    expect(store.writes).toEqual([
      { streamName: "orders", shardId: "shardA", sequenceNumber: "105" },
      { streamName: "orders", shardId: "shardA", sequenceNumber: "110" },
    ]);
    await expect(store.get("orders", "shardA")).resolves.toBe("110");
  });

  it("resumes after the persisted checkpoint", async () => {
    const store = new InMemoryShardCheckpointStore();
    const shardA = new PersistentCheckpointHandle(store, "orders", "shardA");
    const shardB = new PersistentCheckpointHandle(store, "orders", "shardB");

    await shardA.checkpointAt("42");

    await expect(shardA.resumePosition()).resolves.toEqual({
      type: "AFTER_SEQUENCE_NUMBER",
      sequenceNumber: "42",
    });
    await expect(shardB.resumePosition()).resolves.toBeNull();
  });
});
