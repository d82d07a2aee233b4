import { z } from "zod";
import { ConfigError } from "../errors.js";

const grammarSchema = z.object({
  /** npm package name (e.g., "tree-sitter-rust") */
  package: z.string().min(1),
  /** File extensions including the dot (e.g., [".rs"]) */
  extensions: z.array(z.string().regex(/^\.[\w.+-]+$/, "extensions start with '.'")).min(1),
  /** Export to use when the package ships several grammars */
  moduleExport: z.string().min(1).optional(),
});

const scanSchema = z.object({
  /** Sources longer than this (in UTF-16 code units) are rejected with a ParseError */
  maxSourceLength: z.number().int().positive().default(5 * 1024 * 1024),
  /** 0 disables the tree-sitter parse timeout */
  parseTimeoutMicros: z.number().int().nonnegative().default(0),
  /** Extra directories of `<language>/<id>.scm` rule files */
  ruleDirs: z.array(z.string().min(1)).default([]),
});

const loggingSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  json: z.boolean().optional(),
  file: z.string().min(1).optional(),
});

export const configSchema = z.object({
  grammars: z.record(grammarSchema).default({}),
  scan: scanSchema.default({}),
  logging: loggingSchema.default({}),
});

export type GrammarConfig = z.infer<typeof grammarSchema>;
export type ScanConfig = z.infer<typeof scanSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type ScrubQueryConfig = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown, source = "<inline config>"): ScrubQueryConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return result.data;
}
