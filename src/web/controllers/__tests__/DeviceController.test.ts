import { Request, Response } from "express";
import { DeviceController } from "../DeviceController";
import { DisplayError } from "@core/errors";
import { failure, success } from "@core/types";
import { createMockEpaper } from "../../../__tests__/helpers/mockServices";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("DeviceController", () => {
  let controller: DeviceController;
  let epaper: ReturnType<typeof createMockEpaper>;
  let mockResponse: Partial<Response>;
  let jsonMock: jest.Mock;
  let statusMock: jest.Mock;
  let sendMock: jest.Mock;
  let typeMock: jest.Mock;

  beforeEach(() => {
    jsonMock = jest.fn();
    statusMock = jest.fn().mockReturnThis();
    sendMock = jest.fn();
    typeMock = jest.fn().mockReturnThis();
    mockResponse = {
      json: jsonMock,
      status: statusMock,
      send: sendMock,
      type: typeMock,
      setHeader: jest.fn().mockReturnThis(),
    };
    epaper = createMockEpaper();
    controller = new DeviceController("test_clock", epaper);
  });

  it("should describe the service at the root", () => {
    controller.getRoot({} as Request, mockResponse as Response);

    expect(jsonMock).toHaveBeenCalledWith({
      service: "E-Ink Pet Clock API",
      device: "test_clock",
      version: "1.0.0",
    });
  });

  it("should report healthy", () => {
    controller.getHealth({} as Request, mockResponse as Response);

    expect(jsonMock).toHaveBeenCalledWith({
      status: "healthy",
      device: "test_clock",
    });
  });

  it("should send the screen as PNG", async () => {
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
    epaper.getSnapshotPng.mockResolvedValue(success(png));

    await controller.getScreen({} as Request, mockResponse as Response);

    expect(typeMock).toHaveBeenCalledWith("png");
    expect(sendMock).toHaveBeenCalledWith(png);
  });

  it("should answer 404 before anything was displayed", async () => {
    epaper.getSnapshotPng.mockResolvedValue(
      failure(DisplayError.nothingDisplayed()),
    );

    await controller.getScreen({} as Request, mockResponse as Response);

    expect(statusMock).toHaveBeenCalledWith(404);
    expect(jsonMock).toHaveBeenCalledWith({
      success: false,
      error: {
        code: "DISPLAY_NOTHING_DISPLAYED",
        message: "Nothing has been shown on the display yet.",
      },
    });
  });

  it("should answer 500 when encoding fails", async () => {
    epaper.getSnapshotPng.mockResolvedValue(failure(new Error("sharp failed")));

    await controller.getScreen({} as Request, mockResponse as Response);

    expect(statusMock).toHaveBeenCalledWith(500);
  });
});
