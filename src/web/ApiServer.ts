import express, { Express, NextFunction, Request, Response } from "express";
import http from "http";
import { Result, success, failure, WebConfig } from "@core/types";
import {
  IApiServer,
  IEpaperService,
  IInboundEventChannel,
  IMessageLogService,
  IPetStateService,
  IStatsService,
} from "@core/interfaces";
import { WebError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import {
  deviceActionSchema,
  messageRequestSchema,
  validateBody,
} from "@web/validation";
import { DeviceController } from "./controllers/DeviceController";
import { PetController } from "./controllers/PetController";

const logger = getLogger("ApiServer");

export type ApiServerServices = {
  pet: IPetStateService;
  messages: IMessageLogService;
  stats: IStatsService;
  inbound: IInboundEventChannel;
  epaper: IEpaperService;
};

const hasStatus = (error: Error): error is Error & { status: number } =>
  "status" in error && typeof error.status === "number";

/**
 * express server for the companion API
 */
export class ApiServer implements IApiServer {
  private readonly app: Express;
  private server: http.Server | null = null;
  private readonly device: DeviceController;
  private readonly pet: PetController;

  constructor(
    private readonly config: WebConfig,
    deviceName: string,
    services: ApiServerServices,
  ) {
    this.app = express();
    this.device = new DeviceController(deviceName, services.epaper);
    this.pet = new PetController(
      deviceName,
      services.pet,
      services.messages,
      services.stats,
      services.inbound,
    );
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * The express application, for mounting in tests or another server
   */
  getApp(): Express {
    return this.app;
  }

  async start(): Promise<Result<void>> {
    if (this.server) {
      return success(undefined);
    }

    const server = http.createServer(this.app);
    try {
      await new Promise<void>((resolve, reject) => {
        server
          .listen(this.config.port, this.config.host, () => {
            resolve();
          })
          .on("error", (err: NodeJS.ErrnoException) => {
            if (err.code === "EADDRINUSE") {
              reject(WebError.portInUse(this.config.port));
            } else {
              reject(err);
            }
          });
      });
    } catch (error) {
      if (error instanceof WebError) {
        return failure(error);
      }
      return failure(WebError.serverStartFailed(this.config.port, toError(error)));
    }

    this.server = server;
    logger.info(`✓ API listening on ${this.getServerUrl()}`);
    return success(undefined);
  }

  async stop(): Promise<Result<void>> {
    const server = this.server;
    if (!server) {
      return failure(WebError.serverNotRunning());
    }

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server.closeAllConnections();
      });
    } catch (error) {
      return failure(
        new WebError(`Failed to stop server: ${toError(error).message}`),
      );
    }

    this.server = null;
    logger.info("✓ API stopped");
    return success(undefined);
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getServerUrl(): string {
    return `http://${this.config.host}:${this.getPort()}`;
  }

  /**
   * The bound port once listening (differs from the configured one for 0)
   */
  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === "object"
      ? address.port
      : this.config.port;
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    // The companion device and phones on the local network call the API
    // directly, so any origin is allowed when CORS is on
    if (this.config.cors) {
      this.app.use((req, res, next) => {
        res.header("Access-Control-Allow-Origin", "*");
        res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.header("Access-Control-Allow-Headers", "Content-Type");
        if (req.method === "OPTIONS") {
          res.sendStatus(200);
        } else {
          next();
        }
      });
    }

    this.app.use((req, _res, next) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    const api = this.config.apiBasePath;

    this.app.get("/", (req, res) => this.device.getRoot(req, res));
    this.app.get(`${api}/health`, (req, res) => this.device.getHealth(req, res));
    this.app.get(`${api}/screen`, (req, res) => this.device.getScreen(req, res));
    this.app.get(`${api}/status`, (req, res) => this.pet.getStatus(req, res));

    this.app.post(
      `${api}/message`,
      validateBody(messageRequestSchema),
      (req, res) => this.pet.receiveMessage(req, res),
    );
    this.app.post(`${api}/feed`, validateBody(deviceActionSchema), (req, res) =>
      this.pet.receiveFeed(req, res),
    );
    this.app.post(`${api}/poke`, validateBody(deviceActionSchema), (req, res) =>
      this.pet.receivePoke(req, res),
    );

    // 404 handler
    this.app.use((req, res) => {
      const error = WebError.notFound(req.path);
      res.status(404).json({
        success: false,
        error: { code: error.code, message: error.message },
      });
    });

    // Error handler; express recognizes it by its four parameters
    this.app.use(
      (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (hasStatus(err) && err.status === 400) {
          res.status(400).json({
            success: false,
            error: {
              code: "VALIDATION_ERROR",
              message: "Request body is not valid JSON",
            },
          });
          return;
        }
        logger.error("Express error:", err);
        res.status(500).json({
          success: false,
          error: { code: "INTERNAL_ERROR", message: err.message },
        });
      },
    );
  }
}
