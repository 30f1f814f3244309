import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { ConfigurationError, errorMessage } from "../errors";
import { appConfigSchema } from "./schema";
import type { AppConfig, TopicConfig } from "./schema";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `failed to read config file at ${configPath}: ${errorMessage(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `failed to parse YAML in ${configPath}: ${errorMessage(err)}`,
    );
  }

  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(
      `invalid configuration in ${configPath}:\n${issues}`,
    );
  }

  return result.data;
}

export type { AppConfig, TopicConfig };
