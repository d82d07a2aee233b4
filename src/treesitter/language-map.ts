/**
 * Language mapping for Tree-sitter
 *
 * Resolves file extensions to language ids, combining:
 * 1. Built-in grammars shipped with scrubquery
 * 2. Custom grammars from the configuration file
 */

import { createRequire } from "node:module";
import { extname } from "node:path";
import type { SupportedLanguage, LanguageConfig } from "./types.js";
import { BUILTIN_GRAMMARS } from "./builtin-grammars.js";
import type { GrammarConfig } from "../config/schema.js";

// Use createRequire for checking if packages are installed
const require = createRequire(import.meta.url);

function toLanguageConfig(
  language: string,
  grammar: { package: string; extensions: string[]; moduleExport?: string }
): LanguageConfig {
  return {
    language,
    extensions: [...grammar.extensions],
    package: grammar.package,
    moduleExport: grammar.moduleExport,
  };
}

/**
 * Built-in plus custom language configurations.
 * Custom configs override built-in ones with the same name.
 */
export class LanguageMap {
  private readonly configs: Map<string, LanguageConfig> = new Map();
  private readonly extensions: Map<string, string> = new Map();

  constructor(custom: Record<string, GrammarConfig> = {}) {
    for (const [lang, builtin] of Object.entries(BUILTIN_GRAMMARS)) {
      this.configs.set(lang, toLanguageConfig(lang, builtin));
    }
    for (const [lang, grammar] of Object.entries(custom)) {
      this.configs.set(lang, toLanguageConfig(lang, grammar));
    }
    for (const [lang, config] of this.configs) {
      for (const ext of config.extensions) {
        this.extensions.set(ext.toLowerCase(), lang);
      }
    }
  }

  /**
   * Get the language for a file extension
   * @param ext File extension (including dot, e.g., ".ts")
   */
  getLanguageForExtension(ext: string): SupportedLanguage | null {
    return this.extensions.get(ext.toLowerCase()) ?? null;
  }

  getLanguageForPath(filePath: string): SupportedLanguage | null {
    const ext = extname(filePath);
    return ext ? this.getLanguageForExtension(ext) : null;
  }

  getLanguageConfig(language: string): LanguageConfig | null {
    return this.configs.get(language) ?? null;
  }

  isExtensionSupported(ext: string): boolean {
    return this.extensions.has(ext.toLowerCase());
  }

  getSupportedExtensions(): string[] {
    return [...this.extensions.keys()];
  }

  getSupportedLanguages(): SupportedLanguage[] {
    return [...this.configs.keys()];
  }

  /**
   * Check if a language is available (has npm package installed)
   */
  isLanguageAvailable(language: string): boolean {
    const config = this.configs.get(language);
    if (!config) return false;

    try {
      require.resolve(config.package);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Get list of available languages (with packages installed)
   */
  getAvailableLanguages(): string[] {
    return this.getSupportedLanguages().filter((lang) => this.isLanguageAvailable(lang));
  }
}
