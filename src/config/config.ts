import fs from "node:fs";
import { z } from "zod";
import type { EmbeddingsConfig } from "./types.embeddings.js";
import type { MarketFeedConfig, NewsConfig } from "./types.market.js";
import type { SignalsConfig } from "./types.signals.js";
import { ConfigError } from "../errors.js";
import { resolveConfigPath } from "./paths.js";
import { EmbeddingsSchema } from "./zod-schema.embeddings.js";
import { MarketFeedSchema, NewsSchema } from "./zod-schema.market.js";
import { SignalsSchema } from "./zod-schema.signals.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type MarketloreConfig = {
  logging?: { level?: LogLevel };
  signals?: SignalsConfig;
  embeddings?: EmbeddingsConfig;
  news?: NewsConfig;
  market?: MarketFeedConfig;
};

export const LogLevelSchema = z.union([
  z.literal("debug"),
  z.literal("info"),
  z.literal("warn"),
  z.literal("error"),
  z.literal("silent"),
]);

export const MarketloreSchema = z
  .object({
    logging: z.object({ level: LogLevelSchema.optional() }).strict().optional(),
    signals: SignalsSchema,
    embeddings: EmbeddingsSchema,
    news: NewsSchema,
    market: MarketFeedSchema,
  })
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${where}: ${issue.message}`;
  });
}

export function parseConfig(raw: unknown, source = "config"): MarketloreConfig {
  const parsed = MarketloreSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`invalid ${source}: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarketloreConfig {
  const configPath = resolveConfigPath(env);
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    const code = (err as { code?: string }).code;
    if (code === "ENOENT") {
      return {};
    }
    throw err;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`config at ${configPath} is not valid JSON`, {
      cause: String(err),
    });
  }
  return parseConfig(json, configPath);
}
