import { CompanionClient } from "../CompanionClient";
import { CompanionErrorCode } from "@core/errors";
import { DeviceConfig } from "@core/types";
import { createMockStats } from "../../../__tests__/helpers/mockServices";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const CONFIG: DeviceConfig = {
  name: "test_clock",
  remoteHost: "192.168.1.50",
  remotePort: 8000,
  dataDirectory: "./data",
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

describe("CompanionClient", () => {
  let fetchSpy: jest.SpyInstance;
  let stats: ReturnType<typeof createMockStats>;
  let client: CompanionClient;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, "fetch");
    stats = createMockStats();
    client = new CompanionClient(CONFIG, stats);
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it("should post a message with this device's name", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ status: "success" }));

    const result = await client.sendMessage("hi there");

    expect(result.success).toBe(true);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("http://192.168.1.50:8000/api/message");
    expect(init.method).toBe("POST");
    expect(JSON.parse(init.body)).toEqual({
      from_device: "test_clock",
      message: "hi there",
      type: "text",
    });
  });

  it("should send a poke as a poke message", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ status: "success" }));

    await client.sendPoke();

    expect(JSON.parse(fetchSpy.mock.calls[0][1].body)).toEqual({
      from_device: "test_clock",
      message: "Poke!",
      type: "poke",
    });
  });

  it("should post a feed", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ status: "success" }));

    await client.sendFeed();

    expect(fetchSpy.mock.calls[0][0]).toBe("http://192.168.1.50:8000/api/feed");
    expect(JSON.parse(fetchSpy.mock.calls[0][1].body)).toEqual({
      from_device: "test_clock",
    });
  });

  it("should read the remote status", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({
        device_name: "other_clock",
        pet_name: "Bun",
        pet_mood: "happy",
        hunger: 2,
        happiness: 9,
        health: 10,
        messages_count: 3,
        online: true,
      }),
    );

    const result = await client.getRemoteStatus();

    expect(result).toEqual({
      success: true,
      data: {
        device: "other_clock",
        petName: "Bun",
        mood: "happy",
        hunger: 2,
        happiness: 9,
        health: 10,
        online: true,
      },
    });
  });

  it("should reject a malformed status body", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ unexpected: true }));

    const result = await client.getRemoteStatus();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        code: CompanionErrorCode.BAD_RESPONSE,
      });
    }
  });

  it("should record an HTTP error status", async () => {
    fetchSpy.mockResolvedValue(jsonResponse({}, 500));

    const result = await client.sendPoke();

    expect(result.success).toBe(false);
    expect(stats.recordError).toHaveBeenCalledWith(
      "Companion device answered 500 for http://192.168.1.50:8000/api/message",
    );
  });

  it("should record a network failure", async () => {
    fetchSpy.mockRejectedValue(new Error("connect ECONNREFUSED"));

    const result = await client.sendFeed();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        code: CompanionErrorCode.REQUEST_FAILED,
      });
    }
    expect(stats.recordError).toHaveBeenCalledTimes(1);
  });

  it("should report a timeout", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    fetchSpy.mockRejectedValue(timeout);

    const result = await client.sendPoke();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ code: CompanionErrorCode.TIMEOUT });
    }
  });

  it("should fail without a remote host and not touch the network", async () => {
    const alone = new CompanionClient({ ...CONFIG, remoteHost: null }, stats);

    const result = await alone.sendPoke();

    expect(alone.isConfigured()).toBe(false);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        code: CompanionErrorCode.NOT_CONFIGURED,
      });
    }
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(stats.recordError).not.toHaveBeenCalled();
  });
});
