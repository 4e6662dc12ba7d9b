import { HeaderRecord, StatusSnapshot } from "../utils/types/tracker.types";

/**
 * Latest canonical head as seen by the tracker. The stored header is
 * replaced, never mutated, so readers always get a consistent value.
 */
export class StatusService {
  private latestHeader: Readonly<HeaderRecord> | null = null;
  private chainId: bigint = 0n;

  constructor(private readonly startedAt: Date = new Date()) {}

  setChainId(chainId: bigint): void {
    this.chainId = chainId;
  }

  getChainId(): bigint {
    return this.chainId;
  }

  update(header: HeaderRecord): void {
    this.latestHeader = Object.freeze({ ...header });
  }

  getLatestHeader(): Readonly<HeaderRecord> | null {
    return this.latestHeader;
  }

  getSnapshot(now: Date = new Date()): StatusSnapshot {
    return {
      latestHeader: this.latestHeader,
      chainId: this.chainId.toString(),
      startedAt: this.startedAt,
      uptime: Math.round((now.getTime() - this.startedAt.getTime()) / 1000),
    };
  }
}
