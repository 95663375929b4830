import type { ApiStatusDocument } from "@/lib/api/types";
import { ProtocolError } from "@/lib/domain/errors";
import type { DeviceMetadata, DeviceStatus, OutletDescriptor } from "@/lib/domain/models";

/** Splits a comma-separated field; an empty element is an empty list. */
export function splitList(value: string): string[] {
  return value === "" ? [] : value.split(",");
}

export function parseFlag(value: string): boolean {
  return value.trim() === "1";
}

/** The device reports electrical readings in tenths of a unit. */
export function fromTenths(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return Number.parseInt(value, 10) / 10;
}

export function mapOutletStates(outletStatus: string): boolean[] {
  return splitList(outletStatus).map(parseFlag);
}

export function mapMetadata(document: ApiStatusDocument): DeviceMetadata {
  return {
    hostname: document.host_name,
    hardwareVersion: document.hardware_version,
    serialNumber: document.serial_number,
    hasUps: parseFlag(document.hasUPS),
    voltage: fromTenths(document.voltage_value),
    current: fromTenths(document.current_value),
    power: fromTenths(document.power_value),
    cloudStatus: document.cloud_status === undefined ? undefined : parseFlag(document.cloud_status),
  };
}

export function mapOutlets(document: ApiStatusDocument, xml: string): OutletDescriptor[] {
  const names = splitList(document.outlet_name);
  const states = mapOutletStates(document.outlet_status);
  if (names.length !== states.length) {
    throw new ProtocolError(
      `outlet_name lists ${names.length} outlets but outlet_status lists ${states.length}`,
      "OUTLET_COUNT_MISMATCH",
      xml,
    );
  }
  return names.map((name, index) => ({ name, isOn: states[index] ?? false }));
}

export function mapDeviceStatus(document: ApiStatusDocument, xml: string): DeviceStatus {
  return {
    metadata: mapMetadata(document),
    outlets: mapOutlets(document, xml),
  };
}
