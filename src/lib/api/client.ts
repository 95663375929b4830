import { parseControlResponse, parseStatusDocument } from "@/lib/api/parser";
import { mapDeviceStatus, mapOutletStates } from "@/lib/api/transformers";
import type { ControlCommandParams } from "@/lib/api/types";
import { COMMAND_OFF, COMMAND_ON, CONTROL_PATH, STATUS_PATH } from "@/lib/domain/constants";
import type { DeviceStatus } from "@/lib/domain/models";
import type { WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";
import { controlTimeToken } from "@/lib/utils/date";

export function buildControlParams(
  outletIndex: number,
  turnOn: boolean,
  now: Date = new Date(),
): ControlCommandParams {
  return {
    outlet: outletIndex,
    command: turnOn ? COMMAND_ON : COMMAND_OFF,
    time: controlTimeToken(now),
  };
}

export function buildControlPath(params?: ControlCommandParams): string {
  if (!params) {
    return CONTROL_PATH;
  }
  const query = new URLSearchParams({
    outlet: String(params.outlet),
    command: params.command,
    time: params.time,
  });
  return `${CONTROL_PATH}?${query.toString()}`;
}

export class WattBoxApiClient {
  constructor(private readonly transport: WattBoxTransportPort) {}

  commandUrl(params?: ControlCommandParams): string {
    return `${this.transport.baseUrl}${buildControlPath(params)}`;
  }

  async fetchStatusDocument(signal?: AbortSignal): Promise<string> {
    return this.transport.get(STATUS_PATH, undefined, signal);
  }

  /** Bare control.cgi request when no command is given. */
  async sendControl(params?: ControlCommandParams, signal?: AbortSignal): Promise<string> {
    return this.transport.get(
      CONTROL_PATH,
      params ? { outlet: params.outlet, command: params.command, time: params.time } : undefined,
      signal,
    );
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}

export function parseDeviceStatus(xml: string): DeviceStatus {
  return mapDeviceStatus(parseStatusDocument(xml), xml);
}

export function parseOutletStates(xml: string): boolean[] {
  return mapOutletStates(parseControlResponse(xml).outlet_status);
}
