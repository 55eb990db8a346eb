import { Request, Response } from "express";
import {
  IInboundEventChannel,
  IMessageLogService,
  IPetStateService,
  IStatsService,
} from "@core/interfaces";
import { MESSAGES_MAX_STORED } from "@core/constants";
import { getLogger } from "@utils/logger";
import { extractErrorInfo } from "@utils/typeGuards";
import { DeviceActionRequest, MessageRequest } from "@web/validation";

const logger = getLogger("PetController");

type BodyRequest<T> = Request<Record<string, string>, unknown, T>;

/**
 * Endpoints the companion device calls: status, messages, feeding and
 * pokes. Every change is published to the main loop so the panel catches
 * up within one inbound check.
 */
export class PetController {
  constructor(
    private readonly deviceName: string,
    private readonly pet: IPetStateService,
    private readonly messages: IMessageLogService,
    private readonly stats: IStatsService,
    private readonly inbound: IInboundEventChannel,
  ) {}

  /**
   * GET /api/status
   */
  getStatus(_req: Request, res: Response): void {
    const snapshot = this.pet.getSnapshot();
    res.json({
      device_name: this.deviceName,
      pet_name: snapshot.name,
      pet_mood: snapshot.mood,
      hunger: snapshot.hunger,
      happiness: snapshot.happiness,
      health: snapshot.health,
      messages_count: this.messages.getMessages({ limit: MESSAGES_MAX_STORED })
        .length,
      online: true,
    });
  }

  /**
   * POST /api/message
   */
  async receiveMessage(
    req: BodyRequest<MessageRequest>,
    res: Response,
  ): Promise<void> {
    const { from_device: from, message, type } = req.body;
    logger.info(`Message from ${from} (${type})`);

    const stored = await this.messages.addMessage(from, message, type);
    if (!stored.success) {
      await this.fail(res, "receiving message", stored.error);
      return;
    }

    const received = await this.pet.messageReceived();
    if (!received.success) {
      await this.fail(res, "receiving message", received.error);
      return;
    }
    const counted = await this.stats.increment("totalMessagesReceived");
    if (!counted.success) {
      logger.warn(`Could not count message: ${counted.error.message}`);
    }

    if (type === "poke") {
      const poked = await this.pet.interact();
      if (!poked.success) {
        await this.fail(res, "receiving message", poked.error);
        return;
      }
    }

    this.inbound.publish({ type: "message-received", message: stored.data });
    res.json({
      status: "success",
      message: "Message received",
      unread_count: this.messages.getUnreadCount(),
    });
  }

  /**
   * POST /api/feed
   */
  async receiveFeed(
    req: BodyRequest<DeviceActionRequest>,
    res: Response,
  ): Promise<void> {
    const from = req.body.from_device;
    logger.info(`Fed by ${from}`);

    const fed = await this.pet.feed();
    if (!fed.success) {
      await this.fail(res, "handling feed", fed.error);
      return;
    }

    const logged = await this.messages.addMessage(
      from,
      `Fed your ${fed.data.type}!`,
      "feed",
    );
    if (!logged.success) {
      await this.fail(res, "handling feed", logged.error);
      return;
    }

    this.inbound.publish({ type: "fed", from });
    res.json({
      status: "success",
      message: "Pet fed",
      hunger: fed.data.hunger,
      happiness: fed.data.happiness,
    });
  }

  /**
   * POST /api/poke
   */
  async receivePoke(
    req: BodyRequest<DeviceActionRequest>,
    res: Response,
  ): Promise<void> {
    const from = req.body.from_device;
    logger.info(`Poked by ${from}`);

    const poked = await this.pet.interact();
    if (!poked.success) {
      await this.fail(res, "handling poke", poked.error);
      return;
    }

    const logged = await this.messages.addMessage(from, "Poked you!", "poke");
    if (!logged.success) {
      await this.fail(res, "handling poke", logged.error);
      return;
    }

    this.inbound.publish({ type: "poked", from });
    res.json({
      status: "success",
      message: "Poke received",
      happiness: poked.data.happiness,
    });
  }

  /**
   * Answer 500 and count the failure in the device stats
   */
  private async fail(
    res: Response,
    action: string,
    error: Error,
  ): Promise<void> {
    logger.error(`Error ${action}:`, error);
    const recorded = await this.stats.recordError(
      `Error ${action}: ${error.message}`,
    );
    if (!recorded.success) {
      logger.warn(`Could not record error: ${recorded.error.message}`);
    }
    res.status(500).json({
      success: false,
      error: extractErrorInfo(error),
    });
  }
}
