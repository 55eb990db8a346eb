/**
 * Pet mood, derived from the pet's stats and the sleep window
 */
export enum PetMood {
  HAPPY = "happy",
  NEUTRAL = "neutral",
  SAD = "sad",
  HUNGRY = "hungry",
  SICK = "sick",
  SLEEPING = "sleeping",
  DEAD = "dead",
}

/**
 * Persisted pet state
 */
export type PetState = {
  name: string;
  type: string;

  /** 0 (full) to 10 (starving) */
  hunger: number;

  /** 0 to 10 */
  happiness: number;

  /** 0 to 10, the pet is dead at 0 */
  health: number;

  /** ISO timestamps */
  lastFed: string;
  lastInteraction: string;
  lastUpdate: string;
  createdAt: string;

  ageHours: number;
  totalFeeds: number;
  totalInteractions: number;
  messagesSent: number;
  messagesReceived: number;
};

/**
 * Read-only view handed to menus and the API
 */
export type PetSnapshot = Readonly<PetState> & {
  mood: PetMood;
};

/**
 * Animation bookkeeping owned by the AnimationScheduler
 */
export type AnimationState = {
  mood: PetMood;
  /** Frame ids for `mood`; replaced together with it */
  frameSequence: readonly string[];
  frameIndex: number;
  /** Epoch milliseconds of the last advanced frame, null before the first */
  lastFrameTime: number | null;
};
