/**
 * Configuration file loader
 *
 * Loads ~/.scrubquery/config.json (or $SCRUBQUERY_CONFIG), validates it and
 * manages the custom grammar section that is merged over built-in grammars.
 */

import { readFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import { ConfigError } from "../errors.js";
import { parseConfig, type GrammarConfig, type ScrubQueryConfig } from "./schema.js";

/**
 * Default config directory and file paths
 */
export const CONFIG_DIR = join(homedir(), ".scrubquery");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export function getConfigPath(): string {
  return resolve(process.env["SCRUBQUERY_CONFIG"] ?? CONFIG_FILE);
}

/**
 * Load and validate configuration. A missing file yields the defaults;
 * malformed JSON or invalid values throw ConfigError.
 */
export function loadConfig(path?: string): ScrubQueryConfig {
  const configPath = path ? resolve(path) : getConfigPath();

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({}, configPath);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, [err instanceof Error ? err.message : String(err)]);
  }
  return parseConfig(raw, configPath);
}

/**
 * Save configuration, creating the directory if needed
 */
export function saveConfig(config: ScrubQueryConfig, path?: string): void {
  const configPath = path ? resolve(path) : getConfigPath();
  const dir = dirname(configPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(configPath, JSON.stringify(config, null, 2));
}

/**
 * Get custom grammars from config
 */
export function getCustomGrammars(path?: string): Record<string, GrammarConfig> {
  return loadConfig(path).grammars;
}

/**
 * Add a custom grammar to config
 */
export function addCustomGrammar(language: string, grammar: GrammarConfig, path?: string): void {
  const config = loadConfig(path);
  config.grammars[language] = grammar;
  saveConfig(parseConfig(config, path), path);
}

/**
 * Remove a custom grammar from config
 */
export function removeCustomGrammar(language: string, path?: string): boolean {
  const config = loadConfig(path);
  if (!(language in config.grammars)) {
    return false;
  }
  delete config.grammars[language];
  saveConfig(config, path);
  return true;
}

/**
 * Example config for reference
 */
export const EXAMPLE_CONFIG: ScrubQueryConfig = {
  grammars: {
    rust: {
      package: "tree-sitter-rust",
      extensions: [".rs"],
    },
  },
  scan: {
    maxSourceLength: 5 * 1024 * 1024,
    parseTimeoutMicros: 0,
    ruleDirs: [],
  },
  logging: {
    level: "info",
  },
};
