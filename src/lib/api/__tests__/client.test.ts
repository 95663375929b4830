import { describe, expect, it, vi } from "vitest";

import { WattBoxApiClient, buildControlParams, buildControlPath } from "@/lib/api/client";
import type { WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";

describe("buildControlParams", () => {
  it("appends 999 to the epoch seconds of the command time", () => {
    const params = buildControlParams(4, true, new Date(1_700_000_000_456));

    expect(params).toEqual({ outlet: 4, command: "1", time: "1700000000999" });
  });

  it("uses command 0 to switch off", () => {
    expect(buildControlParams(2, false, new Date(0)).command).toBe("0");
  });
});

describe("buildControlPath", () => {
  it("is the bare control endpoint without a command", () => {
    expect(buildControlPath()).toBe("/control.cgi");
  });

  it("encodes outlet, command and time in that order", () => {
    const params = buildControlParams(4, true, new Date(1_700_000_000_000));

    expect(buildControlPath(params)).toBe("/control.cgi?outlet=4&command=1&time=1700000000999");
  });
});

describe("WattBoxApiClient", () => {
  function createTransport(body: string) {
    const get = vi.fn<WattBoxTransportPort["get"]>().mockResolvedValue(body);
    const transport: WattBoxTransportPort = {
      baseUrl: "http://10.0.0.5",
      get,
      close: () => Promise.resolve(),
    };
    return { transport, get };
  }

  it("sends a bare control request when no command is given", async () => {
    const { transport, get } = createTransport("<request/>");
    const client = new WattBoxApiClient(transport);

    await client.sendControl();

    expect(get).toHaveBeenCalledWith("/control.cgi", undefined, undefined);
  });

  it("passes command parameters to the transport", async () => {
    const { transport, get } = createTransport("<request/>");
    const client = new WattBoxApiClient(transport);

    await client.sendControl({ outlet: 3, command: "0", time: "42999" });

    expect(get).toHaveBeenCalledWith(
      "/control.cgi",
      { outlet: 3, command: "0", time: "42999" },
      undefined,
    );
  });

  it("builds absolute command URLs for logging", () => {
    const { transport } = createTransport("");
    const client = new WattBoxApiClient(transport);

    expect(client.commandUrl({ outlet: 1, command: "1", time: "42999" })).toBe(
      "http://10.0.0.5/control.cgi?outlet=1&command=1&time=42999",
    );
  });
});
