import { XMLBuilder } from "fast-xml-parser";
import { z } from "zod";

import rawDevice from "@/data/mock-wattbox.json";
import { CONTROL_PATH, STATUS_PATH } from "@/lib/domain/constants";
import { ConnectivityError } from "@/lib/domain/errors";
import type { QueryParams, WattBoxTransportPort } from "@/lib/ports/WattBoxTransportPort";

export const MockDeviceStateSchema = z.object({
  hostName: z.string(),
  hardwareVersion: z.string(),
  serialNumber: z.string(),
  hasUps: z.boolean(),
  voltageTenths: z.number().int(),
  currentTenths: z.number().int(),
  powerTenths: z.number().int(),
  cloudStatus: z.boolean(),
  outlets: z.array(z.object({ name: z.string(), on: z.boolean() })),
});

export type MockDeviceState = z.infer<typeof MockDeviceStateSchema>;

export interface RecordedRequest {
  path: string;
  params?: QueryParams;
}

const builder = new XMLBuilder({ format: true });

function flag(value: boolean): string {
  return value ? "1" : "0";
}

function defaultState(): MockDeviceState {
  return MockDeviceStateSchema.parse(structuredClone(rawDevice));
}

/**
 * In-memory WattBox. Serves wattbox_info.xml from its state and applies
 * control.cgi commands to it, so the device model can be exercised without
 * hardware.
 */
export class MockWattBoxTransport implements WattBoxTransportPort {
  readonly baseUrl: string;
  readonly requests: RecordedRequest[] = [];

  private state: MockDeviceState;
  private offline = false;
  private readonly scriptedControlBodies: string[] = [];

  constructor(state?: MockDeviceState, host = "wattbox.local") {
    this.state = state ? structuredClone(state) : defaultState();
    this.baseUrl = `http://${host}`;
  }

  setOffline(offline: boolean): void {
    this.offline = offline;
  }

  setOutletNames(names: string[]): void {
    this.state.outlets = names.map((name, index) => ({
      name,
      on: this.state.outlets[index]?.on ?? false,
    }));
  }

  setOutletStates(states: boolean[]): void {
    this.state.outlets = this.state.outlets.map((outlet, index) => ({
      ...outlet,
      on: states[index] ?? outlet.on,
    }));
  }

  /** The next control.cgi call answers with this body instead of the real state. */
  scriptControlResponse(body: string): void {
    this.scriptedControlBodies.push(body);
  }

  controlRequests(): RecordedRequest[] {
    return this.requests.filter((request) => request.path === CONTROL_PATH);
  }

  get(path: string, params?: QueryParams): Promise<string> {
    this.requests.push({ path, params });

    if (this.offline) {
      return Promise.reject(
        new ConnectivityError(`Network error reaching ${this.baseUrl}${path}`, "NETWORK_ERROR"),
      );
    }

    if (path === STATUS_PATH) {
      return Promise.resolve(this.renderStatus());
    }

    if (path === CONTROL_PATH) {
      if (params?.outlet !== undefined && params.command !== undefined) {
        this.applyCommand(Number(params.outlet), String(params.command));
      }
      const scripted = this.scriptedControlBodies.shift();
      return Promise.resolve(scripted ?? this.renderControl());
    }

    return Promise.reject(
      new ConnectivityError(`HTTP 404 Not Found from ${path}`, "HTTP_ERROR", 404),
    );
  }

  close(): Promise<void> {
    return Promise.resolve();
  }

  private applyCommand(outlet: number, command: string): void {
    const target = this.state.outlets[outlet - 1];
    if (!target) {
      return;
    }
    target.on = command === "1";
  }

  private outletStatus(): string {
    return this.state.outlets.map((outlet) => flag(outlet.on)).join(",");
  }

  renderStatus(): string {
    return `<?xml version="1.0"?>\n${builder.build({
      request: {
        host_name: this.state.hostName,
        hardware_version: this.state.hardwareVersion,
        serial_number: this.state.serialNumber,
        hasUPS: flag(this.state.hasUps),
        voltage_value: this.state.voltageTenths,
        current_value: this.state.currentTenths,
        power_value: this.state.powerTenths,
        cloud_status: flag(this.state.cloudStatus),
        outlet_name: this.state.outlets.map((outlet) => outlet.name).join(","),
        outlet_status: this.outletStatus(),
      },
    })}`;
  }

  renderControl(): string {
    return `<?xml version="1.0"?>\n${builder.build({
      request: { outlet_status: this.outletStatus() },
    })}`;
  }
}
