/**
 * Built-in grammar configurations
 *
 * Languages listed here need only their tree-sitter package installed.
 * Users can override these or add new languages via ~/.scrubquery/config.json
 */

/**
 * Built-in grammar configuration
 */
export interface BuiltinGrammar {
  /** npm package name */
  package: string;
  /** File extensions */
  extensions: string[];
  /** How to extract grammar from module (for packages exporting several) */
  moduleExport?: string;
}

/**
 * All built-in grammar configurations
 */
export const BUILTIN_GRAMMARS: Record<string, BuiltinGrammar> = {
  python: {
    package: "tree-sitter-python",
    extensions: [".py", ".pyw", ".pyi"],
  },

  typescript: {
    package: "tree-sitter-typescript",
    extensions: [".ts", ".mts", ".cts"],
    moduleExport: "typescript",
  },

  tsx: {
    package: "tree-sitter-typescript",
    extensions: [".tsx"],
    moduleExport: "tsx",
  },

  javascript: {
    package: "tree-sitter-javascript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
  },

  // Mappings ready, install the package to use
  go: {
    package: "tree-sitter-go",
    extensions: [".go"],
  },

  rust: {
    package: "tree-sitter-rust",
    extensions: [".rs"],
  },

  java: {
    package: "tree-sitter-java",
    extensions: [".java"],
  },

  ruby: {
    package: "tree-sitter-ruby",
    extensions: [".rb", ".rake", ".gemspec"],
  },

  c: {
    package: "tree-sitter-c",
    extensions: [".c", ".h"],
  },

  cpp: {
    package: "tree-sitter-cpp",
    extensions: [".cpp", ".cc", ".cxx", ".hpp", ".hh", ".hxx"],
  },

  csharp: {
    package: "tree-sitter-c-sharp",
    extensions: [".cs"],
  },

  bash: {
    package: "tree-sitter-bash",
    extensions: [".sh", ".bash"],
  },

  php: {
    package: "tree-sitter-php",
    extensions: [".php"],
    moduleExport: "php",
  },
};

/**
 * Get a built-in grammar config
 */
export function getBuiltinGrammar(language: string): BuiltinGrammar | undefined {
  return BUILTIN_GRAMMARS[language];
}

/**
 * Get all built-in language names
 */
export function getBuiltinLanguages(): string[] {
  return Object.keys(BUILTIN_GRAMMARS);
}
