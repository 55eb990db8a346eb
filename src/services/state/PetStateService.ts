import path from "path";
import { IPetStateService, ISettingsService } from "@core/interfaces";
import {
  PetConfig,
  PetMood,
  PetSnapshot,
  PetState,
  Result,
  failure,
  success,
} from "@core/types";
import { StateError } from "@core/errors";
import {
  PET_HAPPINESS_DECAY_PER_HOUR,
  PET_HUNGER_DECAY_PER_HOUR,
  PET_MIN_DECAY_INTERVAL_MS,
  PET_STAT_MAX,
} from "@core/constants";
import { getLogger } from "@utils/logger";
import { JsonStateStore } from "./JsonStateStore";
import { PetStateSchema } from "./schemas";

const logger = getLogger("PetStateService");

const MS_PER_HOUR = 3_600_000;

const clampStat = (value: number): number =>
  Math.min(PET_STAT_MAX, Math.max(0, value));

export const defaultPetState = (
  config: PetConfig,
  now: Date = new Date(),
): PetState => {
  const iso = now.toISOString();
  return {
    name: config.name,
    type: config.type,
    hunger: 5,
    happiness: 8,
    health: 10,
    lastFed: iso,
    lastInteraction: iso,
    lastUpdate: iso,
    createdAt: iso,
    ageHours: 0,
    totalFeeds: 0,
    totalInteractions: 0,
    messagesSent: 0,
    messagesReceived: 0,
  };
};

/**
 * Mood from the stats alone, ignoring the sleep window
 */
export function moodFromStats(
  state: Pick<PetState, "hunger" | "happiness" | "health">,
): PetMood {
  if (state.health === 0) return PetMood.DEAD;
  if (state.health <= 3) return PetMood.SICK;
  if (state.hunger >= 7) return PetMood.HUNGRY;
  if (state.happiness >= 8) return PetMood.HAPPY;
  if (state.happiness <= 3) return PetMood.SAD;
  return PetMood.NEUTRAL;
}

/**
 * The virtual pet, persisted in pet.json
 */
export class PetStateService implements IPetStateService {
  private readonly store: JsonStateStore<PetState>;
  private state: PetState | null = null;

  constructor(
    dataDirectory: string,
    private readonly config: PetConfig,
    private readonly settings: ISettingsService,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.store = new JsonStateStore(
      path.join(dataDirectory, "pet.json"),
      PetStateSchema,
      () => defaultPetState(this.config, this.clock()),
    );
  }

  async initialize(): Promise<Result<void>> {
    const loaded = await this.store.load();
    if (!loaded.success) {
      return failure(loaded.error);
    }
    this.state = loaded.data;
    logger.info(
      `Pet ${this.state.name} loaded (hunger ${this.state.hunger}, happiness ${this.state.happiness}, health ${this.state.health})`,
    );
    return success(undefined);
  }

  get hunger(): number {
    return this.current().hunger;
  }

  get happiness(): number {
    return this.current().happiness;
  }

  get health(): number {
    return this.current().health;
  }

  getMood(now: Date = this.clock()): PetMood {
    const state = this.current();
    if (state.health === 0) {
      return PetMood.DEAD;
    }
    if (this.settings.isInSleepWindow(now)) {
      return PetMood.SLEEPING;
    }
    return moodFromStats(state);
  }

  getSnapshot(now: Date = this.clock()): PetSnapshot {
    return { ...this.current(), mood: this.getMood(now) };
  }

  async feed(): Promise<Result<PetSnapshot>> {
    const state = this.current();
    const now = this.clock();
    const pending = this.commit({
      ...state,
      hunger: clampStat(state.hunger - 3),
      happiness: clampStat(state.happiness + 1),
      lastFed: now.toISOString(),
      totalFeeds: state.totalFeeds + 1,
    });
    const snapshot = this.getSnapshot(now);
    const saved = await pending;
    if (!saved.success) {
      return failure(saved.error);
    }
    logger.info(`${state.name} was fed (hunger ${snapshot.hunger})`);
    return success(snapshot);
  }

  async interact(): Promise<Result<PetSnapshot>> {
    const state = this.current();
    const now = this.clock();
    const pending = this.commit({
      ...state,
      happiness: clampStat(state.happiness + 2),
      lastInteraction: now.toISOString(),
      totalInteractions: state.totalInteractions + 1,
    });
    const snapshot = this.getSnapshot(now);
    const saved = await pending;
    if (!saved.success) {
      return failure(saved.error);
    }
    return success(snapshot);
  }

  messageSent(): Promise<Result<void>> {
    const state = this.current();
    return this.commit({ ...state, messagesSent: state.messagesSent + 1 });
  }

  messageReceived(): Promise<Result<void>> {
    const state = this.current();
    return this.commit({
      ...state,
      messagesReceived: state.messagesReceived + 1,
    });
  }

  async updateState(now: Date = this.clock()): Promise<Result<boolean>> {
    const state = this.current();
    const elapsedMs = now.getTime() - Date.parse(state.lastUpdate);
    if (elapsedMs < PET_MIN_DECAY_INTERVAL_MS) {
      return success(false);
    }

    const hours = elapsedMs / MS_PER_HOUR;
    const hunger = clampStat(
      state.hunger + Math.floor(hours * PET_HUNGER_DECAY_PER_HOUR),
    );
    const happiness = clampStat(
      state.happiness - Math.floor(hours * PET_HAPPINESS_DECAY_PER_HOUR),
    );

    let health = state.health;
    if (hunger >= 8) {
      health = clampStat(health - 1);
    } else if (hunger <= 2 && happiness >= 7) {
      health = clampStat(health + 1);
    }

    const saved = await this.commit({
      ...state,
      hunger,
      happiness,
      health,
      ageHours: state.ageHours + Math.floor(hours),
      lastUpdate: now.toISOString(),
    });
    if (!saved.success) {
      return failure(saved.error);
    }
    logger.debug(
      `Decay after ${hours.toFixed(2)}h: hunger ${hunger}, happiness ${happiness}, health ${health}`,
    );
    return success(true);
  }

  private current(): PetState {
    if (!this.state) {
      throw StateError.notInitialized("PetStateService");
    }
    return this.state;
  }

  /**
   * Replace the state now and persist it. Mutators read `this.state` and call
   * this without awaiting in between, so overlapping calls never share a
   * starting point.
   */
  private commit(next: PetState): Promise<Result<void>> {
    this.state = next;
    return this.store.save(next);
  }
}
