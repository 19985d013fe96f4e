import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/cmorph-sync/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "cmorph-sync",
  "config.yaml"
);

/** Environment variable holding the RDA account password */
export const SECRET_ENV = "RDAPSWD";
/** Environment variable overriding the local data root */
export const DATA_ROOT_ENV = "AUSREFDIR";

export const CONFIG_DEFAULTS = {
  dataRoot: "/g/data/ia39/aus-ref-clim-data-nci",
  baseUrl: "https://rda.ucar.edu/data/ds502.2/",
  loginUrl: "https://rda.ucar.edu/cgi-bin/login",
  logLevel: "info",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z.object({
  dataRoot: z.string().min(1).optional(),
  remote: z
    .object({
      baseUrl: z.string().url().optional(),
      loginUrl: z.string().url().optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
      file: z.string().min(1).optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ResolvedConfig {
  dataRoot: string;
  /** `{dataRoot}/cmorph/data` */
  dataDir: string;
  baseUrl: string;
  loginUrl: string;
  logLevel: LogLevel;
  logJson: boolean;
  logFile: string;
}

/** Settings that come from the command line. */
export interface CliOverrides {
  debug?: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Merge configuration sources with precedence:
 * CLI args > environment > user config > system config > defaults
 */
export function resolveConfig(
  cli: CliOverrides = {},
  env: NodeJS.ProcessEnv = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const files = [systemConfig, userConfig].filter(
    (c): c is ConfigFile => c !== undefined
  );

  let dataRoot: string = CONFIG_DEFAULTS.dataRoot;
  let baseUrl: string = CONFIG_DEFAULTS.baseUrl;
  let loginUrl: string = CONFIG_DEFAULTS.loginUrl;
  let logLevel: LogLevel = CONFIG_DEFAULTS.logLevel;
  let logJson = false;
  let logFile: string | undefined;

  for (const file of files) {
    dataRoot = file.dataRoot ?? dataRoot;
    baseUrl = file.remote?.baseUrl ?? baseUrl;
    loginUrl = file.remote?.loginUrl ?? loginUrl;
    logLevel = file.logging?.level ?? logLevel;
    logJson = file.logging?.json ?? logJson;
    logFile = file.logging?.file ?? logFile;
  }

  const envRoot = env[DATA_ROOT_ENV];
  if (envRoot) {
    dataRoot = envRoot;
  }

  if (cli.debug) {
    logLevel = "debug";
  }

  return {
    dataRoot,
    dataDir: `${dataRoot}/cmorph/data`,
    baseUrl: baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`,
    loginUrl,
    logLevel,
    logJson,
    logFile: logFile ?? `${dataRoot}/cmorph/code/update_log.txt`,
  };
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - config file given on the command line; replaces the
 *   system and user files
 * @returns The resolved config and the files that were loaded
 */
export function loadConfig(
  cli: CliOverrides = {},
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    if (!existsSync(explicitPath)) {
      throw invalidConfig(explicitPath, ["file does not exist"]);
    }
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cli, env, userConfig, systemConfig);

  return { config, sources };
}
