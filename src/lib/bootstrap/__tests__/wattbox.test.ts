import { describe, expect, it } from "vitest";

import { MockWattBoxTransport } from "@/lib/adapters/mockTransport";
import { createWattBox, createWattBoxFromEnv } from "@/lib/bootstrap/wattbox";
import { silentLogger } from "@/lib/utils/logger";

describe("createWattBox", () => {
  it("validates config before building the device", () => {
    expect(() => createWattBox({ host: "", username: "admin", password: "test-secret" })).toThrow(
      "host is required",
    );
  });

  it("passes config and overrides through", async () => {
    const transport = new MockWattBoxTransport();
    const wattbox = createWattBox(
      { host: "10.0.0.5", username: "admin", password: "test-secret", simulateOnly: true },
      { transport, logger: silentLogger },
    );

    await wattbox.loadFullStatus();

    expect(wattbox.host).toBe("10.0.0.5");
    expect(wattbox.simulateOnly).toBe(true);
    expect(wattbox.outlets).toHaveLength(6);
  });
});

describe("createWattBoxFromEnv", () => {
  it("serves the in-memory device when WATTBOX_USE_MOCK is set", async () => {
    const wattbox = createWattBoxFromEnv(
      {
        WATTBOX_HOSTNAME: "10.0.0.5",
        WATTBOX_USERNAME: "admin",
        WATTBOX_PASSWORD: "test-secret",
        WATTBOX_AREA: "Rack A",
        WATTBOX_USE_MOCK: "true",
      },
      { logger: silentLogger },
    );

    await wattbox.loadFullStatus();

    expect(wattbox.area).toBe("Rack A");
    expect(wattbox.hostname).toBe("rack-wattbox");
    expect(wattbox.getOutlet(4)?.displayName).toBe("Access Point [4]");
  });
});
