/**
 * Application configuration.
 *
 * Layers, later wins: schema defaults, YAML file, TERMFOLIO_* environment
 * variables, command-line flags.
 */

import { existsSync } from "node:fs";
import { parseArgs } from "node:util";
import { type Static, Type } from "@sinclair/typebox";
import {
  type ConfigLayer,
  ConfigError,
  envLayer,
  errorMessage,
  readYamlLayer,
  resolveConfig,
} from "termfolio-core";
import { type ColorLevel, detectColorLevel } from "termfolio-tui";

export const AppConfigSchema = Type.Object(
  {
    mode: Type.Union([Type.Literal("local"), Type.Literal("serve")], { default: "local" }),
    host: Type.String({ default: "0.0.0.0" }),
    port: Type.Integer({ minimum: 1, maximum: 65535, default: 2222 }),
    hostKeyPath: Type.String({ default: ".ssh/id_ed25519" }),
    contentDir: Type.String({ default: "content" }),
    title: Type.String({ default: "Terminal Portfolio" }),
    colorLevel: Type.Union(
      [Type.Literal("auto"), Type.Literal("truecolor"), Type.Literal("ansi256"), Type.Literal("none")],
      { default: "auto" }
    ),
    clock: Type.Boolean({ default: false }),
    maxSessions: Type.Integer({ minimum: 1, default: 32 }),
    debug: Type.Boolean({ default: false }),
    logFile: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);

export type AppConfig = Static<typeof AppConfigSchema>;

export const DEFAULT_CONFIG_FILE = "termfolio.yaml";
export const CONFIG_ENV = "TERMFOLIO_CONFIG";

/** Config key → environment variable. */
export const ENV_VARS: Record<string, string> = {
  host: "TERMFOLIO_HOST",
  port: "TERMFOLIO_PORT",
  hostKeyPath: "TERMFOLIO_HOST_KEY",
  contentDir: "TERMFOLIO_CONTENT_DIR",
  title: "TERMFOLIO_TITLE",
  colorLevel: "TERMFOLIO_COLOR",
  clock: "TERMFOLIO_CLOCK",
  maxSessions: "TERMFOLIO_MAX_SESSIONS",
  debug: "TERMFOLIO_DEBUG",
  logFile: "TERMFOLIO_LOG_FILE",
};

export const USAGE = `Usage: termfolio [options]

Options:
  --serve            serve over SSH instead of running in this terminal
  --host <host>      SSH listen address (default 0.0.0.0)
  --port <port>      SSH listen port (default 2222)
  --host-key <path>  SSH host key, generated when missing (default .ssh/id_ed25519)
  --content <dir>    content directory (default content)
  --color <level>    auto, truecolor, ansi256 or none (default auto)
  --clock            show a clock in the navbar
  --debug            write debug lines to the log
  --log-file <path>  append log lines to this file
  --config <path>    YAML config file (default termfolio.yaml when present)
  -h, --help         show this help`;

export interface CliArgs {
  help: boolean;
  configPath?: string;
  /** Flag values as a config layer; unset flags are undefined. */
  layer: ConfigLayer;
}

const CLI_OPTIONS = {
  serve: { type: "boolean" },
  host: { type: "string" },
  port: { type: "string" },
  "host-key": { type: "string" },
  content: { type: "string" },
  color: { type: "string" },
  clock: { type: "boolean" },
  debug: { type: "boolean" },
  "log-file": { type: "string" },
  config: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ConfigError(`Invalid arguments: ${errorMessage(err)}`);
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = parseFlags(argv);
  return {
    help: values.help ?? false,
    configPath: values.config,
    layer: {
      mode: values.serve ? "serve" : undefined,
      host: values.host,
      port: values.port,
      hostKeyPath: values["host-key"],
      contentDir: values.content,
      colorLevel: values.color,
      clock: values.clock,
      debug: values.debug,
      logFile: values["log-file"],
    },
  };
}

/** Pick the YAML file: explicit path, then TERMFOLIO_CONFIG, then ./termfolio.yaml if present. */
function fileLayer(configPath: string | undefined, env: Record<string, string | undefined>): ConfigLayer {
  const explicit = configPath ?? env[CONFIG_ENV];
  if (explicit) return readYamlLayer(explicit);
  return existsSync(DEFAULT_CONFIG_FILE) ? readYamlLayer(DEFAULT_CONFIG_FILE, true) : {};
}

export function loadAppConfig(args: CliArgs, env: Record<string, string | undefined>): AppConfig {
  return resolveConfig(AppConfigSchema, [
    fileLayer(args.configPath, env),
    envLayer(env, ENV_VARS),
    args.layer,
  ]);
}

/**
 * Turn the colour setting into a level. Over SSH the client environment is
 * not visible, so `auto` means 256 colours there.
 */
export function resolveColorLevel(config: AppConfig, env: Record<string, string | undefined>): ColorLevel {
  if (config.colorLevel !== "auto") return config.colorLevel;
  return config.mode === "serve" ? "ansi256" : detectColorLevel(env);
}
