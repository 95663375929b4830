import { MockWattBoxTransport } from "@/lib/adapters/mockTransport";
import {
  loadConfigFromEnv,
  parseConfig,
  type WattBoxConfigInput,
} from "@/lib/config/env";
import type { WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";
import { WattBox } from "@/lib/services/WattBox";
import type { WattBoxLogger } from "@/lib/utils/logger";

export interface CreateWattBoxOverrides {
  transport?: WattBoxTransportPort;
  logger?: WattBoxLogger;
}

export function createWattBox(
  input: WattBoxConfigInput,
  overrides: CreateWattBoxOverrides = {},
): WattBox {
  const config = parseConfig(input);
  return new WattBox({ ...config, ...overrides });
}

/**
 * Builds a device from WATTBOX_* variables. WATTBOX_USE_MOCK=true swaps the
 * HTTP transport for the in-memory device.
 */
export function createWattBoxFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: CreateWattBoxOverrides = {},
): WattBox {
  const config = loadConfigFromEnv(env);
  const useMock = (env.WATTBOX_USE_MOCK ?? "false") === "true";
  const transport =
    overrides.transport ?? (useMock ? new MockWattBoxTransport(undefined, config.host) : undefined);
  return new WattBox({ ...config, ...overrides, transport });
}
