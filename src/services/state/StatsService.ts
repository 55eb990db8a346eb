import path from "path";
import { IStatsService } from "@core/interfaces";
import {
  DeviceStats,
  Result,
  StatCounter,
  failure,
  success,
} from "@core/types";
import { JsonStateStore } from "./JsonStateStore";
import { DeviceStatsSchema } from "./schemas";

export const defaultStats = (now: Date = new Date()): DeviceStats => ({
  firstBoot: now.toISOString(),
  totalUptimeHours: 0,
  totalButtonPresses: 0,
  totalDisplayUpdates: 0,
  totalMessagesSent: 0,
  totalMessagesReceived: 0,
  networkErrors: 0,
  lastError: null,
});

/**
 * Device counters in stats.json
 */
export class StatsService implements IStatsService {
  private readonly store: JsonStateStore<DeviceStats>;
  private stats: DeviceStats;

  constructor(
    dataDirectory: string,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.store = new JsonStateStore(
      path.join(dataDirectory, "stats.json"),
      DeviceStatsSchema,
      () => defaultStats(this.clock()),
    );
    this.stats = defaultStats(this.clock());
  }

  async initialize(): Promise<Result<void>> {
    const loaded = await this.store.load();
    if (!loaded.success) {
      return failure(loaded.error);
    }
    this.stats = loaded.data;
    return success(undefined);
  }

  getStats(): Readonly<DeviceStats> {
    return { ...this.stats };
  }

  increment(counter: StatCounter, amount = 1): Promise<Result<void>> {
    this.stats = { ...this.stats, [counter]: this.stats[counter] + amount };
    return this.store.save(this.stats);
  }

  /**
   * Count a network error and remember its message
   */
  recordError(message: string): Promise<Result<void>> {
    this.stats = {
      ...this.stats,
      networkErrors: this.stats.networkErrors + 1,
      lastError: { message, timestamp: this.clock().toISOString() },
    };
    return this.store.save(this.stats);
  }
}
