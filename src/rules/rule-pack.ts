/**
 * Rule packs - directories of `.scm` query files
 *
 * Layout is `<dir>/<language>/<rule-id>.scm`. The language directory sets
 * the query's language and the file path its id; everything else comes from
 * `#set!` directives in the file.
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { ScrubQueryConfig } from "../config/schema.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { PredicateRegistry } from "../predicates/registry.js";
import { compileAll, type CompileAllResult, type QueryDefinition } from "../query/compiler.js";

/** Rules shipped with the package */
export const BUILTIN_RULES_DIR = fileURLToPath(new URL("../../rules/", import.meta.url));

export interface LoadRulePackOptions {
  predicates?: PredicateRegistry;
  logger?: Logger;
}

export interface LoadConfiguredRulesOptions extends LoadRulePackOptions {
  /** Relative `scan.ruleDirs` entries resolve against this; defaults to the working directory */
  baseDir?: string;
}

async function listDirs(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
}

async function listRuleFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(".scm"))
    .map((e) => e.name)
    .sort();
}

/**
 * Compile every rule under `dir`. A rule that fails to compile is reported
 * in `failures` and does not stop the others.
 */
export async function loadRulePack(dir: string, options: LoadRulePackOptions = {}): Promise<CompileAllResult> {
  const logger = options.logger ?? silentLogger();
  const definitions: QueryDefinition[] = [];

  for (const language of await listDirs(dir)) {
    const languageDir = join(dir, language);
    for (const file of await listRuleFiles(languageDir)) {
      const path = join(languageDir, file);
      definitions.push({
        source: await readFile(path, "utf-8"),
        metadata: { id: `${language}/${basename(file, ".scm")}`, language },
        origin: path,
      });
    }
  }

  const result = compileAll(definitions, options.predicates);
  for (const failure of result.failures) {
    logger.warn({ rule: failure.id, file: failure.origin, code: failure.error.code }, failure.error.message);
  }
  logger.debug({ dir, rules: result.queries.length, failed: result.failures.length }, "rule pack loaded");
  return result;
}

/**
 * Built-in rules followed by those of each extra directory, in order
 */
export async function loadRulePacks(
  dirs: readonly string[],
  options: LoadRulePackOptions = {}
): Promise<CompileAllResult> {
  const combined: CompileAllResult = { queries: [], failures: [] };
  for (const dir of [BUILTIN_RULES_DIR, ...dirs]) {
    const { queries, failures } = await loadRulePack(dir, options);
    combined.queries.push(...queries);
    combined.failures.push(...failures);
  }
  return combined;
}

/**
 * Built-in rules plus the configured `scan.ruleDirs`
 */
export async function loadConfiguredRules(
  config: ScrubQueryConfig,
  options: LoadConfiguredRulesOptions = {}
): Promise<CompileAllResult> {
  const { baseDir = process.cwd(), ...packOptions } = options;
  const dirs = config.scan.ruleDirs.map((dir) => resolve(baseDir, dir));
  return loadRulePacks(dirs, packOptions);
}
