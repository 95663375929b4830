import { z } from "zod";

import { DEFAULT_TIMEOUT_MS } from "@/lib/domain/constants";

const booleanText = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const WattBoxConfigSchema = z.object({
  host: z.string().trim().min(1, "host is required"),
  username: z.string(),
  password: z.string(),
  area: z.string().default(""),
  simulateOnly: z.boolean().default(false),
  protocol: z.enum(["http", "https"]).default("http"),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type WattBoxConfig = z.infer<typeof WattBoxConfigSchema>;
export type WattBoxConfigInput = z.input<typeof WattBoxConfigSchema>;

const EnvSchema = z.object({
  WATTBOX_HOSTNAME: z.string({ required_error: "WATTBOX_HOSTNAME is not set" }),
  WATTBOX_USERNAME: z.string({ required_error: "WATTBOX_USERNAME is not set" }),
  WATTBOX_PASSWORD: z.string({ required_error: "WATTBOX_PASSWORD is not set" }),
  WATTBOX_AREA: z.string().optional(),
  WATTBOX_SIMULATE: booleanText.optional(),
  WATTBOX_PROTOCOL: z.enum(["http", "https"]).optional(),
  WATTBOX_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export function parseConfig(input: WattBoxConfigInput): WattBoxConfig {
  return WattBoxConfigSchema.parse(input);
}

/** Throws a ZodError naming every missing or invalid variable. */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): WattBoxConfig {
  const vars = EnvSchema.parse(env);
  return parseConfig({
    host: vars.WATTBOX_HOSTNAME,
    username: vars.WATTBOX_USERNAME,
    password: vars.WATTBOX_PASSWORD,
    area: vars.WATTBOX_AREA,
    simulateOnly: vars.WATTBOX_SIMULATE,
    protocol: vars.WATTBOX_PROTOCOL,
    timeoutMs: vars.WATTBOX_TIMEOUT_MS,
  });
}
