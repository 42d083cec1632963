import type { SequenceNumber, SequenceRange } from "@shardstream/replay";

/** Per shard, the end of the most recent range whose batch was stored. */
export class LatestStoredSequences {
  private readonly latest = new Map<string, SequenceNumber>();

  record(range: SequenceRange): void {
    this.latest.set(range.shardId, range.toSeq);
  }

  get(shardId: string): SequenceNumber | undefined {
    return this.latest.get(shardId);
  }

  shardIds(): string[] {
    return [...this.latest.keys()];
  }
}
