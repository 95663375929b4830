import { ZodError } from "zod";
import { describe, expect, it } from "vitest";

import { loadConfigFromEnv, parseConfig } from "@/lib/config/env";

const env = {
  WATTBOX_HOSTNAME: "10.0.0.5",
  WATTBOX_USERNAME: "admin",
  WATTBOX_PASSWORD: "test-secret",
};

describe("loadConfigFromEnv", () => {
  it("applies defaults for optional settings", () => {
    expect(loadConfigFromEnv(env)).toEqual({
      host: "10.0.0.5",
      username: "admin",
      password: "test-secret",
      area: "",
      simulateOnly: false,
      protocol: "http",
      timeoutMs: 5000,
    });
  });

  it("reads optional settings", () => {
    const config = loadConfigFromEnv({
      ...env,
      WATTBOX_AREA: "Rack A",
      WATTBOX_SIMULATE: "1",
      WATTBOX_PROTOCOL: "https",
      WATTBOX_TIMEOUT_MS: "2500",
    });

    expect(config).toMatchObject({
      area: "Rack A",
      simulateOnly: true,
      protocol: "https",
      timeoutMs: 2500,
    });
  });

  it("rejects a missing hostname", () => {
    const { WATTBOX_HOSTNAME, ...rest } = env;

    expect(() => loadConfigFromEnv(rest)).toThrow(ZodError);
  });

  it("rejects an unknown simulate flag", () => {
    expect(() => loadConfigFromEnv({ ...env, WATTBOX_SIMULATE: "yes" })).toThrow(ZodError);
  });
});

describe("parseConfig", () => {
  it("rejects a blank host", () => {
    expect(() => parseConfig({ host: "  ", username: "admin", password: "test-secret" })).toThrow(
      "host is required",
    );
  });
});
