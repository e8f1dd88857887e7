import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const nonBlankList = (label: string) =>
  z
    .array(z.string())
    .transform((values) => values.map((value) => value.trim()).filter(Boolean))
    .refine((values) => values.length > 0, `At least one ${label} is required`);

const monitorFileSchema = z.object({
  version: z.number().int().optional(),
  keywords: nonBlankList("keyword"),
  domains: nonBlankList("domain"),
  intervalMinutes: z.number().int().min(1).default(60),
  runImmediately: z.boolean().default(true),
  probeDelayMs: z.number().int().min(0).default(1000),
  retentionDays: z.number().int().min(0).default(90),
  searchParams: z.record(z.string()).default({}),
});

export type MonitorFileConfig = z.infer<typeof monitorFileSchema>;

export function parseMonitorConfig(input: unknown): MonitorFileConfig {
  const result = monitorFileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid monitor configuration: ${issues}`);
  }
  return result.data;
}

export async function readMonitorConfig(configPath: string): Promise<MonitorFileConfig> {
  const absolute = path.isAbsolute(configPath) ? configPath : path.resolve(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await fs.readFile(absolute, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException | undefined)?.code;
    if (code === "ENOENT") {
      throw new ConfigurationError(`Monitor configuration not found: ${absolute}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Monitor configuration is not valid JSON: ${absolute}`);
  }
  return parseMonitorConfig(parsed);
}
