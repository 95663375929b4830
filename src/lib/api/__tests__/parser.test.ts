import { describe, expect, it } from "vitest";

import { parseDeviceStatus, parseOutletStates } from "@/lib/api/client";
import { parseStatusDocument } from "@/lib/api/parser";
import { ProtocolError } from "@/lib/domain/errors";

function statusXml(fields: Record<string, string>): string {
  const children = Object.entries(fields)
    .map(([name, value]) => `  <${name}>${value}</${name}>`)
    .join("\n");
  return `<?xml version="1.0"?>\n<request>\n${children}\n</request>`;
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

const baseFields = {
  host_name: "lab-strip",
  hardware_version: "WB-300-IP-3",
  serial_number: "0012",
  hasUPS: "0",
  voltage_value: "1200",
  current_value: "15",
  power_value: "1805",
  cloud_status: "1",
  outlet_name: "Router,TV,Lamp",
  outlet_status: "1,0,1",
};

describe("parseDeviceStatus", () => {
  it("maps metadata and divides electrical readings by ten", () => {
    const status = parseDeviceStatus(statusXml(baseFields));

    expect(status.metadata).toEqual({
      hostname: "lab-strip",
      hardwareVersion: "WB-300-IP-3",
      serialNumber: "0012",
      hasUps: false,
      voltage: 120,
      current: 1.5,
      power: 180.5,
      cloudStatus: true,
    });
  });

  it("pairs outlet names with their status positionally", () => {
    const status = parseDeviceStatus(statusXml(baseFields));

    expect(status.outlets).toEqual([
      { name: "Router", isOn: true },
      { name: "TV", isOn: false },
      { name: "Lamp", isOn: true },
    ]);
  });

  it("leaves optional readings unset when the device omits them", () => {
    const { voltage_value, current_value, power_value, cloud_status, ...required } = baseFields;
    const status = parseDeviceStatus(statusXml({ ...required, hasUPS: "1" }));

    expect(status.metadata.hasUps).toBe(true);
    expect(status.metadata.voltage).toBeUndefined();
    expect(status.metadata.current).toBeUndefined();
    expect(status.metadata.power).toBeUndefined();
    expect(status.metadata.cloudStatus).toBeUndefined();
  });

  it("treats empty outlet lists as a strip without outlets", () => {
    const status = parseDeviceStatus(statusXml({ ...baseFields, outlet_name: "", outlet_status: "" }));

    expect(status.outlets).toEqual([]);
  });

  it("rejects name and status lists of different lengths", () => {
    const xml = statusXml({ ...baseFields, outlet_status: "1,0" });

    expect(() => parseDeviceStatus(xml)).toThrow(ProtocolError);
    expect(() => parseDeviceStatus(xml)).toThrow(
      "outlet_name lists 3 outlets but outlet_status lists 2",
    );
  });

  it("reports a missing required field by name", () => {
    const { serial_number, ...rest } = baseFields;
    const xml = statusXml(rest);

    const error = thrownBy(() => parseStatusDocument(xml));

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({
      code: "MISSING_FIELD",
      message: 'Missing required field "serial_number"',
      payload: xml,
    });
  });

  it("rejects non-integer readings", () => {
    const xml = statusXml({ ...baseFields, voltage_value: "12.5" });

    expect(thrownBy(() => parseStatusDocument(xml))).toMatchObject({ code: "INVALID_FIELD" });
  });

  it("rejects malformed markup", () => {
    const xml = "<request><outlet_status>1,0</request>";

    expect(thrownBy(() => parseStatusDocument(xml))).toMatchObject({
      code: "MALFORMED_XML",
      payload: xml,
    });
  });
});

describe("parseOutletStates", () => {
  it("reads only outlet_status from a control response", () => {
    const xml = '<?xml version="1.0"?>\n<request><outlet_status>0,1,0</outlet_status></request>';

    expect(parseOutletStates(xml)).toEqual([false, true, false]);
  });

  it("requires outlet_status", () => {
    const xml = "<request><host_name>lab-strip</host_name></request>";

    expect(thrownBy(() => parseOutletStates(xml))).toMatchObject({ code: "MISSING_FIELD" });
  });
});
