import {
  IHomeMenu,
  IMenu,
  IMenuStateMachine,
  IRefreshCoordinator,
} from "@core/interfaces";
import {
  HomeField,
  MenuConfig,
  MenuId,
  NavigationEvent,
  NavigationState,
  Result,
  TransitionOutcome,
  failure,
} from "@core/types";
import { MenuError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { RenderGuard } from "./RenderGuard";

const logger = getLogger("MenuStateMachine");

const HOME_INDEX = 0;

/**
 * Home, Messages, Stats and Settings in a ring, with Home at index 0.
 *
 * Every framebuffer mutation runs inside one RenderGuard, and the guard
 * stays held until the panel update has finished. Button transitions queue
 * on the guard; the periodic entry points skip their turn when it is held.
 */
export class MenuStateMachine implements IMenuStateMachine {
  private readonly menus: IMenu[];
  private readonly guard = new RenderGuard();
  private readonly state: NavigationState = {
    activeMenuIndex: HOME_INDEX,
    needsRender: false,
    inTransition: false,
    rendering: false,
    renderFailureCount: 0,
    lastButtonTime: Number.NEGATIVE_INFINITY,
  };
  private pendingFull = false;
  private isSetUp = false;

  constructor(
    private readonly home: IHomeMenu,
    others: IMenu[],
    private readonly coordinator: IRefreshCoordinator,
    private readonly config: MenuConfig,
    private readonly clock: () => number = Date.now,
  ) {
    this.menus = [home, ...others];
  }

  async setup(): Promise<void> {
    await this.guard.runExclusive(async () => {
      this.state.activeMenuIndex = HOME_INDEX;
      this.coordinator.invalidateBaseImage();
      const result = await this.invoke(() => this.home.render(true));
      if (!result.success) {
        throw MenuError.renderFailed(MenuId.HOME, result.error);
      }
      this.state.needsRender = false;
      this.isSetUp = true;
    });
    logger.info(`Menu state machine ready with ${this.menus.length} menus`);
  }

  async handleEvent(event: NavigationEvent): Promise<TransitionOutcome> {
    this.requireSetUp();
    const now = this.clock();

    if (now - this.state.lastButtonTime < this.config.minButtonIntervalMs) {
      logger.debug(`Dropped ${event}: inside throttle window`);
      return TransitionOutcome.THROTTLED;
    }
    if (this.state.rendering || this.state.inTransition) {
      logger.debug(`Dropped ${event}: render in progress`);
      return TransitionOutcome.BUSY;
    }
    this.state.lastButtonTime = now;

    // Set before waiting so later events see the transition as in progress
    this.state.inTransition = true;
    try {
      await this.guard.runExclusive(() => this.apply(event));
    } finally {
      this.state.inTransition = false;
    }
    return TransitionOutcome.APPLIED;
  }

  async renderCurrent(): Promise<boolean> {
    this.requireSetUp();
    if (!this.state.needsRender) {
      return false;
    }

    const attempt = await this.guard.tryRunExclusive(async () => {
      if (!this.state.needsRender) {
        return false;
      }
      const full = this.pendingFull;
      this.state.needsRender = false;
      this.pendingFull = false;
      await this.runMenuAction(() => this.activeMenu().render(full));
      return true;
    });
    return attempt.acquired && attempt.value;
  }

  requestRender(full = false): void {
    this.state.needsRender = true;
    if (full) {
      this.pendingFull = true;
    }
  }

  async tryUpdateHomeField(field: HomeField): Promise<boolean> {
    if (
      !this.isSetUp ||
      !this.isHomeActive() ||
      this.state.rendering ||
      this.state.inTransition
    ) {
      return false;
    }

    const attempt = await this.guard.tryRunExclusive(async () => {
      if (!this.isHomeActive()) {
        return false;
      }
      const result = await this.invoke(() =>
        field === "clock"
          ? this.home.updateClockField()
          : this.home.updateSpriteField(),
      );
      if (!result.success) {
        logger.warn(`Home ${field} update failed: ${result.error.message}`);
        this.coordinator.invalidateBaseImage();
        this.requestRender(true);
        return false;
      }
      this.state.renderFailureCount = 0;
      return true;
    });
    return attempt.acquired && attempt.value;
  }

  getActiveMenuId(): MenuId {
    return this.activeMenu().id;
  }

  isHomeActive(): boolean {
    return this.state.activeMenuIndex === HOME_INDEX;
  }

  isInTransition(): boolean {
    return this.state.inTransition;
  }

  getState(): Readonly<NavigationState> {
    return { ...this.state };
  }

  private async apply(event: NavigationEvent): Promise<void> {
    switch (event) {
      case NavigationEvent.NEXT:
        await this.navigateTo(
          (this.state.activeMenuIndex + 1) % this.menus.length,
        );
        break;
      case NavigationEvent.BACK:
        if (this.isHomeActive()) {
          await this.runMenuAction(() => this.home.onBack());
        } else {
          await this.navigateTo(HOME_INDEX);
        }
        break;
      case NavigationEvent.ACTIVATE:
        await this.runMenuAction(() => this.activeMenu().onActivate());
        break;
      case NavigationEvent.REFRESH:
        this.coordinator.invalidateBaseImage();
        await this.runMenuAction(() => this.activeMenu().render(true));
        break;
    }
  }

  /**
   * Switching screens invalidates the base image for every menu
   */
  private async navigateTo(index: number): Promise<void> {
    const from = this.activeMenu().id;
    this.state.activeMenuIndex = index;
    this.coordinator.invalidateBaseImage();
    logger.info(`Menu ${from} -> ${this.activeMenu().id}`);
    await this.runMenuAction(() => this.activeMenu().render(true));
  }

  /**
   * Run a menu action with the rendering flag set and count its failure
   */
  private async runMenuAction(
    action: () => Promise<Result<void>>,
  ): Promise<void> {
    const result = await this.invoke(action);
    if (result.success) {
      this.state.renderFailureCount = 0;
      this.state.needsRender = false;
      return;
    }
    await this.recordFailure(result.error);
  }

  private async invoke(
    action: () => Promise<Result<void>>,
  ): Promise<Result<void>> {
    this.state.rendering = true;
    try {
      return await action();
    } catch (error) {
      return failure(toError(error));
    } finally {
      this.state.rendering = false;
    }
  }

  private async recordFailure(error: Error): Promise<void> {
    this.state.renderFailureCount++;
    const count = this.state.renderFailureCount;
    logger.warn(
      `Render of ${this.activeMenu().id} failed (${count}/${this.config.failureThreshold}): ${error.message}`,
    );

    if (count < this.config.failureThreshold) {
      this.requestRender(true);
      return;
    }

    logger.error(`${count} consecutive render failures, recovering to home`);
    this.state.activeMenuIndex = HOME_INDEX;
    this.coordinator.invalidateBaseImage();

    const recovery = await this.invoke(() => this.home.render(true));
    if (!recovery.success) {
      throw MenuError.recoveryFailed(count, recovery.error);
    }

    this.state.renderFailureCount = 0;
    this.state.needsRender = false;
    this.pendingFull = false;
    logger.info("Recovered to home screen");
  }

  private activeMenu(): IMenu {
    return this.menus[this.state.activeMenuIndex];
  }

  private requireSetUp(): void {
    if (!this.isSetUp) {
      throw MenuError.notSetUp();
    }
  }
}
