import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve as resolvePath } from "node:path";

import { ContractError, ContractErrorCode } from "@strata/compiler";

import type { StrataOptions } from "./options.js";

/** Options as written in `strata.config.json`. */
export interface StrataConfig extends StrataOptions {
  /** Another config file (or a directory holding one) whose values this file overrides. */
  extends?: string;
}

export const CONFIG_FILE_NAME = "strata.config.json";

/**
 * Load the nearest `strata.config.json`, walking up from `searchFrom` to `root`.
 * `extends` chains are followed and merged; a `root` in any file resolves
 * against that file's directory, and defaults to the directory of the file found.
 *
 * @returns Loaded config or null if no config file was found
 * @throws ContractError(INVALID_OPTIONS) for malformed files or circular `extends`
 */
export async function loadConfigFile(root: string, searchFrom?: string): Promise<StrataConfig | null> {
  const rootDir = resolvePath(root);
  const startDir = resolveSearchDir(rootDir, searchFrom);
  const configPath = findConfigFile(startDir, rootDir);
  if (!configPath) {
    return null;
  }

  const config = await loadConfigWithExtends(configPath, new Set());
  const { extends: _extends, ...options } = config;
  return { ...options, root: options.root ?? dirname(configPath) };
}

function resolveSearchDir(rootDir: string, searchFrom?: string): string {
  if (!searchFrom) {
    return rootDir;
  }
  const resolved = resolvePath(searchFrom);
  if (existsSync(resolved) && statSync(resolved).isFile()) {
    return dirname(resolved);
  }
  return resolved;
}

function findConfigFile(startDir: string, rootDir: string): string | null {
  let current = startDir;

  while (true) {
    const candidate = join(current, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    if (current === rootDir) {
      break;
    }
    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return null;
}

async function loadConfigWithExtends(configPath: string, visited: Set<string>): Promise<StrataConfig> {
  const resolvedPath = resolvePath(configPath);
  if (visited.has(resolvedPath)) {
    throw new ContractError(
      `Circular config extends detected: ${[...visited, resolvedPath].join(" -> ")}`,
      ContractErrorCode.INVALID_OPTIONS,
    );
  }
  visited.add(resolvedPath);

  const config = await readConfig(resolvedPath);
  if (!config.extends) {
    return config;
  }

  const baseConfig = await loadExtendedConfig(config.extends, dirname(resolvedPath), visited);
  return mergeConfigs(baseConfig, config);
}

async function loadExtendedConfig(specifier: string, baseDir: string, visited: Set<string>): Promise<StrataConfig> {
  const resolved = resolvePath(baseDir, specifier);
  const configPath = existsSync(resolved) && statSync(resolved).isDirectory() ? join(resolved, CONFIG_FILE_NAME) : resolved;
  if (!existsSync(configPath)) {
    throw new ContractError(`Extended config '${specifier}' was not found from ${baseDir}.`, ContractErrorCode.INVALID_OPTIONS);
  }
  return loadConfigWithExtends(configPath, visited);
}

async function readConfig(configPath: string): Promise<StrataConfig> {
  const text = await readFile(configPath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContractError(`${configPath} is not valid JSON: ${reason}`, ContractErrorCode.INVALID_OPTIONS);
  }
  return parseConfig(raw, configPath);
}

/** Check the shape of a parsed config file. Unknown keys are ignored. */
export function parseConfig(raw: unknown, configPath: string): StrataConfig {
  if (!isRecord(raw)) {
    throw new ContractError(`${configPath} must contain a JSON object.`, ContractErrorCode.INVALID_OPTIONS);
  }
  const fail = (key: string, expected: string): never => {
    throw new ContractError(`${configPath}: '${key}' must be ${expected}.`, ContractErrorCode.INVALID_OPTIONS);
  };
  const str = (key: string): string | undefined => {
    const value = raw[key];
    if (value === undefined) return undefined;
    return typeof value === "string" ? value : fail(key, "a string");
  };
  const strList = (key: string): string[] | undefined => {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) return fail(key, "an array of strings");
    return value.map((item) => (typeof item === "string" ? item : fail(key, "an array of strings")));
  };

  const config: StrataConfig = {};
  const root = str("root");
  if (root !== undefined) config.root = resolvePath(dirname(configPath), root);
  const pages = strList("pages");
  if (pages !== undefined) config.pages = pages;
  const importsFileName = str("importsFileName");
  if (importsFileName !== undefined) config.importsFileName = importsFileName;
  const namespace = str("namespace");
  if (namespace !== undefined) config.namespace = namespace;
  const defaultModel = str("defaultModel");
  if (defaultModel !== undefined) config.defaultModel = defaultModel;
  const pageExtension = str("pageExtension");
  if (pageExtension !== undefined) config.pageExtension = pageExtension;
  const exclude = strList("exclude");
  if (exclude !== undefined) config.exclude = exclude;
  const extendsValue = str("extends");
  if (extendsValue !== undefined) config.extends = extendsValue;

  const concurrency = raw["concurrency"];
  if (concurrency !== undefined) {
    config.concurrency = typeof concurrency === "number" ? concurrency : fail("concurrency", "a number");
  }
  const write = raw["write"];
  if (write !== undefined) {
    config.write = typeof write === "boolean" ? write : fail("write", "a boolean");
  }
  return config;
}

/**
 * Merge configs with proper precedence; `override` wins key by key.
 * Lists replace rather than concatenate.
 */
export function mergeConfigs(base: StrataConfig | null, override: StrataConfig): StrataConfig {
  if (!base) {
    return override;
  }
  return { ...base, ...override };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
