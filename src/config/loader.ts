/**
 * Configuration Loader
 *
 * Reads treevisit settings from an environment object and validates them
 * with zod.
 *
 * | Variable | Values | Default |
 * |----------|--------|---------|
 * | `TREEVISIT_LOG_LEVEL` | `DEBUG`, `INFO`, `WARN`, `ERROR`, `SILENT` | `WARN` |
 * | `TREEVISIT_PRINT_STYLE` | `tree`, `indent`, `bullet` | `tree` |
 *
 * @example
 * ```typescript
 * const options = applyConfig(loadConfig(process.env));
 * console.log(printTree(root, options));
 * ```
 *
 * @module config/loader
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/error-types.ts";
import { setupLogger } from "../telemetry/logger.ts";
import { PrintStyleSchema, type PrintTreeOptions } from "./schemas.ts";

export const LOG_LEVEL_ENV = "TREEVISIT_LOG_LEVEL";
export const PRINT_STYLE_ENV = "TREEVISIT_PRINT_STYLE";

const LogLevelSchema = z.enum(["DEBUG", "INFO", "WARN", "ERROR", "SILENT"]);

/**
 * Environment schema; keys are the variable names
 */
const EnvSchema = z.object({
  [LOG_LEVEL_ENV]: z
    .string()
    .transform((s) => s.trim().toUpperCase())
    .pipe(LogLevelSchema)
    .default("WARN"),
  [PRINT_STYLE_ENV]: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(PrintStyleSchema)
    .default("tree"),
});

export interface TreeVisitConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  printStyle: z.infer<typeof PrintStyleSchema>;
}

/**
 * Build the configuration from an environment object
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): TreeVisitConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(
      `Invalid configuration${key ? ` for ${key}` : ""}: ${issue?.message ?? "unknown error"}`,
      key,
    );
  }
  return {
    logLevel: result.data[LOG_LEVEL_ENV],
    printStyle: result.data[PRINT_STYLE_ENV],
  };
}

/**
 * Configure logging and return the printer options the config selects
 */
export function applyConfig(config: TreeVisitConfig): PrintTreeOptions {
  setupLogger({ level: config.logLevel });
  return { style: config.printStyle };
}
