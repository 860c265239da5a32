/**
 * Layered configuration resolved against a typebox schema.
 *
 * Layers are plain objects merged left to right (later wins, `undefined`
 * never overrides). String values coming from the environment or CLI flags
 * are coerced to the schema's types, schema defaults fill the gaps, and the
 * result must pass `Value.Check`.
 */
import { existsSync, readFileSync } from "node:fs";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { ConfigError, errorMessage } from "./errors.js";

export type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function mergeLayers(layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

/**
 * Read a YAML config file into a layer.
 * A missing optional file yields an empty layer; an empty document too.
 */
export function readYamlLayer(path: string, optional = false): ConfigLayer {
  if (!existsSync(path)) {
    if (optional) return {};
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to parse config at ${path}: ${errorMessage(err)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config at ${path} must be a mapping of keys to values`);
  }
  return parsed;
}

/** Pick environment variables into a layer. `mapping` is config key → env var name. */
export function envLayer(
  env: Record<string, string | undefined>,
  mapping: Record<string, string>
): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, name] of Object.entries(mapping)) {
    const value = env[name];
    if (value !== undefined && value !== "") layer[key] = value;
  }
  return layer;
}

export function resolveConfig<T extends TSchema>(schema: T, layers: ConfigLayer[]): Static<T> {
  const converted = Value.Convert(schema, mergeLayers(layers));
  const value = Value.Default(schema, converted);

  if (!Value.Check(schema, value)) {
    const issues = [...Value.Errors(schema, value)].map(
      (e) => `${e.path || "/"}: ${e.message}`
    );
    throw new ConfigError("Invalid configuration", issues);
  }
  return value;
}
