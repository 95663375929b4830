import type { WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";
import type { WattBoxLogger } from "@/lib/utils/logger";

export type Protocol = "http" | "https";

export interface WattBoxCredentials {
  username: string;
  password: string;
}

export interface WattBoxOptions extends WattBoxCredentials {
  host: string;
  area?: string;
  simulateOnly?: boolean;
  protocol?: Protocol;
  timeoutMs?: number;
  /** Overrides the HTTP transport built from host, credentials and protocol. */
  transport?: WattBoxTransportPort;
  logger?: WattBoxLogger;
}

export interface DeviceMetadata {
  hostname: string;
  hardwareVersion: string;
  serialNumber: string;
  hasUps: boolean;
  voltage?: number;
  current?: number;
  power?: number;
  cloudStatus?: boolean;
}

export interface OutletDescriptor {
  name: string;
  isOn: boolean;
}

export interface DeviceStatus {
  metadata: DeviceMetadata;
  outlets: OutletDescriptor[];
}

export interface OutletSnapshot {
  readonly displayName: string;
  readonly outletIndex: number;
  readonly isOn: boolean;
}

export interface WattBoxSnapshot {
  readonly host: string;
  readonly area: string;
  readonly simulateOnly: boolean;
  readonly metadata?: Readonly<DeviceMetadata>;
  readonly lastUpdated?: Date;
  readonly outlets: readonly OutletSnapshot[];
}
