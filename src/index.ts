export { WattBox } from "@/lib/services/WattBox";
export { Outlet, type OutletHost } from "@/lib/services/Outlet";

export { createWattBox, createWattBoxFromEnv } from "@/lib/bootstrap/wattbox";
export type { CreateWattBoxOverrides } from "@/lib/bootstrap/wattbox";
export {
  WattBoxConfigSchema,
  loadConfigFromEnv,
  parseConfig,
  type WattBoxConfig,
  type WattBoxConfigInput,
} from "@/lib/config/env";

export { HttpTransport, basicAuthHeader, type HttpTransportConfig } from "@/lib/adapters/httpTransport";
export { MockWattBoxTransport, type MockDeviceState } from "@/lib/adapters/mockTransport";
export type { QueryParams, WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";

export {
  WattBoxApiClient,
  buildControlParams,
  buildControlPath,
  parseDeviceStatus,
  parseOutletStates,
} from "@/lib/api/client";

export {
  ConnectivityError,
  ProtocolError,
  WattBoxError,
  isConnectivityError,
  isProtocolError,
} from "@/lib/domain/errors";
export type {
  ConnectivityErrorCode,
  ProtocolErrorCode,
  WattBoxErrorCode,
} from "@/lib/domain/errors";
export type {
  DeviceMetadata,
  OutletSnapshot,
  Protocol,
  WattBoxCredentials,
  WattBoxOptions,
  WattBoxSnapshot,
} from "@/lib/domain/models";
export { REFRESH_DEBOUNCE_MS } from "@/lib/domain/constants";

export { createConsoleLogger, silentLogger, type WattBoxLogger } from "@/lib/utils/logger";
