/**
 * Configuration loading
 *
 * Settings come from three layers, later ones winning:
 * 1. Built-in defaults
 * 2. A YAML file (TASKPOOL_CONFIG, or ./taskpool.yml when present)
 * 3. TASKPOOL_* environment variables
 *
 * YAML keys are snake_case:
 *
 * ```yaml
 * max_workers: 8
 * daemon: false
 * log_level: debug
 * output_file: ./output.txt
 * server:
 *   host: 127.0.0.1
 *   port: 3000
 * ```
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { LOG_LEVELS } from "../logger";
import { ConfigurationError, toError } from "../queue/errors";

export const DEFAULT_CONFIG_FILE = "taskpool.yml";

const PortSchema = z.number().int().min(0).max(65535);

/**
 * Layout of the YAML configuration file
 */
const ConfigFileSchema = z
  .object({
    max_workers: z.number().int().positive().optional(),
    daemon: z.boolean().optional(),
    log_level: z.enum(LOG_LEVELS).optional(),
    output_file: z.string().min(1).optional(),
    server: z
      .object({
        host: z.string().min(1).optional(),
        port: PortSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const BooleanStringSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  TASKPOOL_MAX_WORKERS: z.coerce.number().int().positive().optional(),
  TASKPOOL_DAEMON: BooleanStringSchema.optional(),
  TASKPOOL_HOST: z.string().min(1).optional(),
  TASKPOOL_PORT: z.coerce.number().pipe(PortSchema).optional(),
  TASKPOOL_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  TASKPOOL_OUTPUT_FILE: z.string().min(1).optional(),
  TASKPOOL_CONFIG: z.string().min(1).optional(),
});

const TaskpoolConfigSchema = z.object({
  maxWorkers: z.number().int().positive().default(4),
  daemon: z.boolean().default(false),
  host: z.string().min(1).default("0.0.0.0"),
  port: PortSchema.default(3000),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /** File the write-line handler appends to; the handler is off without it */
  outputFile: z.string().min(1).optional(),
  /** Configuration file the values were read from, if any */
  configFile: z.string().optional(),
});

export type TaskpoolConfig = z.infer<typeof TaskpoolConfigSchema>;

export interface LoadConfigOptions {
  /** Environment to read TASKPOOL_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Explicit configuration file; must exist when given */
  configPath?: string;
  /** Directory searched for taskpool.yml (default: process.cwd()) */
  cwd?: string;
}

function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

/**
 * Read and validate the taskpool configuration.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(options: LoadConfigOptions = {}): TaskpoolConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = readEnv(options.env ?? process.env);

  const explicitPath = options.configPath ?? env.TASKPOOL_CONFIG;
  let configFile: string | undefined;
  if (explicitPath !== undefined) {
    configFile = path.resolve(cwd, explicitPath);
  } else if (fs.existsSync(path.join(cwd, DEFAULT_CONFIG_FILE))) {
    configFile = path.join(cwd, DEFAULT_CONFIG_FILE);
  }
  const file: ConfigFile = configFile ? readConfigFile(configFile) : {};

  const result = TaskpoolConfigSchema.safeParse({
    maxWorkers: env.TASKPOOL_MAX_WORKERS ?? file.max_workers,
    daemon: env.TASKPOOL_DAEMON ?? file.daemon,
    host: env.TASKPOOL_HOST ?? file.server?.host,
    port: env.TASKPOOL_PORT ?? file.server?.port,
    logLevel: env.TASKPOOL_LOG_LEVEL ?? file.log_level,
    outputFile: env.TASKPOOL_OUTPUT_FILE ?? file.output_file,
    configFile,
  });
  if (!result.success) {
    throw new ConfigurationError("Invalid configuration", formatIssues(result.error.issues));
  }
  return result.data;
}

function readEnv(env: NodeJS.ProcessEnv): z.infer<typeof EnvSchema> {
  // Empty variables count as unset
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("TASKPOOL_") && value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigurationError("Invalid environment", formatIssues(result.error.issues));
  }
  return result.data;
}

function readConfigFile(filePath: string): ConfigFile {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}`, [toError(err).message]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(`Cannot parse configuration file ${filePath}`, [toError(err).message]);
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration file ${filePath}`, formatIssues(result.error.issues));
  }
  return result.data;
}
