/**
 * GrammarRegistry - Maps language ids to grammars
 *
 * Populated once at start-up, then sealed: the first parse (or an explicit
 * seal()) makes the registry read-only so that concurrent scans never race
 * with registration. Adding a language is a registry entry only; nothing in
 * the matcher depends on a particular grammar.
 */

import { extname } from "node:path";
import { RegistrySealedError, UnsupportedLanguageError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { ScrubQueryConfig } from "../config/schema.js";
import { LanguageMap } from "./language-map.js";
import type { SyntaxTree } from "./syntax-tree.js";
import { TreeSitterGrammar } from "./tree-sitter-grammar.js";
import type { Grammar, SupportedLanguage } from "./types.js";

export interface GrammarRegistryOptions {
  logger?: Logger;
}

export class GrammarRegistry {
  private readonly grammars: Map<string, Grammar> = new Map();
  private readonly extensions: Map<string, string> = new Map();
  private readonly logger: Logger;
  private sealed: boolean = false;

  constructor(options: GrammarRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Register a grammar. Later registrations for the same language or
   * extension replace earlier ones.
   */
  register(grammar: Grammar): this {
    if (this.sealed) {
      throw new RegistrySealedError(grammar.language);
    }
    this.grammars.set(grammar.language, grammar);
    for (const ext of grammar.extensions) {
      this.extensions.set(ext.toLowerCase(), grammar.language);
    }
    this.logger.debug({ language: grammar.language, extensions: grammar.extensions }, "grammar registered");
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  has(language: string): boolean {
    return this.grammars.has(language);
  }

  getLanguages(): SupportedLanguage[] {
    return [...this.grammars.keys()];
  }

  getSupportedExtensions(): string[] {
    return [...this.extensions.keys()];
  }

  getLanguageForPath(filePath: string): SupportedLanguage | null {
    const ext = extname(filePath).toLowerCase();
    return ext ? this.extensions.get(ext) ?? null : null;
  }

  get(language: string): Grammar {
    const grammar = this.grammars.get(language);
    if (!grammar) {
      throw new UnsupportedLanguageError(language);
    }
    return grammar;
  }

  /**
   * Parse source text with the grammar registered for `language`.
   * Error-recovered trees are returned; check `tree.hasErrors`.
   */
  parse(language: string, source: string): SyntaxTree {
    this.sealed = true;
    return this.get(language).parse(source);
  }

  /**
   * Parse a document, picking the grammar by file extension (e.g., ".py")
   */
  parseDocument(source: string, ext: string): SyntaxTree {
    const language = this.extensions.get(ext.toLowerCase());
    if (!language) {
      throw new UnsupportedLanguageError(ext);
    }
    return this.parse(language, source);
  }
}

export interface DefaultRegistryOptions {
  config?: ScrubQueryConfig;
  logger?: Logger;
}

/**
 * Registry with a TreeSitterGrammar for every built-in or configured
 * language whose package is installed. Left unsealed so callers can add
 * grammars of their own before scanning.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): GrammarRegistry {
  const logger = options.logger ?? silentLogger();
  const registry = new GrammarRegistry({ logger });
  const languageMap = new LanguageMap(options.config?.grammars ?? {});
  const scan = options.config?.scan;

  for (const language of languageMap.getSupportedLanguages()) {
    const config = languageMap.getLanguageConfig(language);
    if (!config) continue;
    if (!languageMap.isLanguageAvailable(language)) {
      logger.debug({ language, package: config.package }, "grammar package not installed, skipping");
      continue;
    }
    registry.register(
      new TreeSitterGrammar(config, {
        maxSourceLength: scan?.maxSourceLength,
        parseTimeoutMicros: scan?.parseTimeoutMicros,
      })
    );
  }

  return registry;
}
