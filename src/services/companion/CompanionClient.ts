import { z } from "zod";
import { ICompanionClient, IStatsService, RemoteStatus } from "@core/interfaces";
import { DeviceConfig, MessageKind, Result, failure, success } from "@core/types";
import { CompanionError } from "@core/errors";
import { COMPANION_REQUEST_TIMEOUT_MS } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("CompanionClient");

/**
 * Body of GET /api/status on the companion device
 */
const RemoteStatusSchema = z.object({
  device_name: z.string(),
  pet_name: z.string().optional(),
  pet_mood: z.string().optional(),
  hunger: z.number().optional(),
  happiness: z.number().optional(),
  health: z.number().optional(),
  online: z.boolean().default(true),
});

const isTimeout = (error: Error): boolean =>
  error.name === "TimeoutError" || error.name === "AbortError";

/**
 * Talks to the paired device's HTTP API
 */
export class CompanionClient implements ICompanionClient {
  constructor(
    private readonly config: DeviceConfig,
    private readonly stats: IStatsService,
    private readonly timeoutMs: number = COMPANION_REQUEST_TIMEOUT_MS,
  ) {}

  isConfigured(): boolean {
    return this.config.remoteHost !== null;
  }

  async sendMessage(
    text: string,
    type: MessageKind = "text",
  ): Promise<Result<void>> {
    const result = await this.request("POST", "/api/message", {
      from_device: this.config.name,
      message: text,
      type,
    });
    return result.success ? success(undefined) : failure(result.error);
  }

  sendPoke(): Promise<Result<void>> {
    return this.sendMessage("Poke!", "poke");
  }

  async sendFeed(): Promise<Result<void>> {
    const result = await this.request("POST", "/api/feed", {
      from_device: this.config.name,
    });
    return result.success ? success(undefined) : failure(result.error);
  }

  async getRemoteStatus(): Promise<Result<RemoteStatus>> {
    const result = await this.request("GET", "/api/status");
    if (!result.success) {
      return failure(result.error);
    }

    const parsed = RemoteStatusSchema.safeParse(result.data);
    if (!parsed.success) {
      return this.fail(
        CompanionError.badResponse(this.url("/api/status"), 200),
      );
    }
    const body = parsed.data;
    return success({
      device: body.device_name,
      petName: body.pet_name,
      mood: body.pet_mood,
      hunger: body.hunger,
      happiness: body.happiness,
      health: body.health,
      online: body.online,
    });
  }

  private url(endpoint: string): string {
    return `http://${this.config.remoteHost}:${this.config.remotePort}${endpoint}`;
  }

  private async request(
    method: "GET" | "POST",
    endpoint: string,
    body?: Record<string, string>,
  ): Promise<Result<unknown>> {
    if (!this.isConfigured()) {
      return failure(CompanionError.notConfigured());
    }

    const url = this.url(endpoint);
    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: body ? { "Content-Type": "application/json" } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const err = toError(error);
      return this.fail(
        isTimeout(err)
          ? CompanionError.timeout(url, this.timeoutMs)
          : CompanionError.requestFailed(url, err),
      );
    }

    if (!response.ok) {
      return this.fail(CompanionError.badResponse(url, response.status));
    }

    try {
      const data: unknown = await response.json();
      return success(data);
    } catch (error) {
      return this.fail(CompanionError.requestFailed(url, toError(error)));
    }
  }

  /**
   * Count the error in the device stats before handing it back
   */
  private async fail(error: CompanionError): Promise<Result<never>> {
    logger.warn(error.message);
    const recorded = await this.stats.recordError(error.message);
    if (!recorded.success) {
      logger.warn(`Could not record network error: ${recorded.error.message}`);
    }
    return failure(error);
  }
}
