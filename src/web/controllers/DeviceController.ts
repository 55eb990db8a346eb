import { Request, Response } from "express";
import { IEpaperService } from "@core/interfaces";
import { DisplayErrorCode } from "@core/errors";
import { WEB_SERVICE_NAME, WEB_SERVICE_VERSION } from "@core/constants";
import { getLogger } from "@utils/logger";
import { extractErrorInfo } from "@utils/typeGuards";

const logger = getLogger("DeviceController");

/**
 * Service identity, health and the current screen
 */
export class DeviceController {
  constructor(
    private readonly deviceName: string,
    private readonly epaper: IEpaperService,
  ) {}

  /**
   * GET /
   */
  getRoot(_req: Request, res: Response): void {
    res.json({
      service: WEB_SERVICE_NAME,
      device: this.deviceName,
      version: WEB_SERVICE_VERSION,
    });
  }

  /**
   * GET /api/health
   */
  getHealth(_req: Request, res: Response): void {
    res.json({ status: "healthy", device: this.deviceName });
  }

  /**
   * GET /api/screen: the last frame pushed to the panel, as PNG
   */
  async getScreen(_req: Request, res: Response): Promise<void> {
    const result = await this.epaper.getSnapshotPng();

    if (!result.success) {
      const info = extractErrorInfo(result.error);
      const status = info.code === DisplayErrorCode.NOTHING_DISPLAYED ? 404 : 500;
      if (status === 500) {
        logger.error("Failed to render screen snapshot:", result.error);
      }
      res.status(status).json({ success: false, error: info });
      return;
    }

    res.type("png");
    res.setHeader("Cache-Control", "no-store");
    res.send(result.data);
  }
}
