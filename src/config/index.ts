// pattern: Imperative Shell
import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { appConfigSchema } from "./schema";
import type { AppConfig, RetryPolicy } from "./schema";

/** Raised for any configuration that cannot be used; fatal at startup. */
export class ConfigError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

function formatIssues(issues: ReadonlyArray<ZodIssue>): string {
  return issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Parses and validates YAML configuration text. An empty document yields the
 * defaults of every section. `source` only names the text in error messages.
 */
export function parseConfig(text: string, source: string): AppConfig {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(source, `failed to parse YAML in ${source}: ${message}`, {
      cause: err,
    });
  }

  const result = appConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(
      source,
      `invalid configuration in ${source}:\n${formatIssues(result.error.issues)}`,
    );
  }
  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let text: string;
  try {
    text = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      configPath,
      `failed to read config file at ${configPath}: ${message}`,
      { cause: err },
    );
  }

  return parseConfig(text, configPath);
}

export type { AppConfig, RetryPolicy };
