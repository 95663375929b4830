import { z } from "zod";

const integerText = z.string().trim().regex(/^-?\d+$/, "expected an integer");

/** Direct children of the root element of wattbox_info.xml. */
export const ApiStatusDocumentSchema = z.object({
  host_name: z.string(),
  hardware_version: z.string(),
  serial_number: z.string(),
  hasUPS: z.string(),
  outlet_name: z.string(),
  outlet_status: z.string(),
  voltage_value: integerText.optional(),
  current_value: integerText.optional(),
  power_value: integerText.optional(),
  cloud_status: z.string().optional(),
});

export type ApiStatusDocument = z.infer<typeof ApiStatusDocumentSchema>;

/** control.cgi replies with the same root element; only outlet_status is read. */
export const ApiControlResponseSchema = z.object({
  outlet_status: z.string(),
});

export type ApiControlResponse = z.infer<typeof ApiControlResponseSchema>;

export interface ControlCommandParams {
  outlet: number;
  command: string;
  time: string;
}
