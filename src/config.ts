import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { UnresolvedPolicy } from "./column-resolver";
import { ConfigError, errorMessage } from "./errors";
import { DEFAULT_DIALECT, MULTI_DIALECT_ORDER, normalizeDialect } from "./sql-parser";

export const CONFIG_FILE_NAME = "colref.config.json";

export const UnresolvedPolicySchema = z.enum(["drop", "first-table"]);

export const ConfigFileSchema = z
  .object({
    dialect: z.string().min(1).optional(),
    multiDialect: z.boolean().optional(),
    dialects: z.array(z.string().min(1)).min(1).optional(),
    resolveUnqualified: z.boolean().optional(),
    unresolvedPolicy: UnresolvedPolicySchema.optional(),
    output: z.string().min(1).optional(),
    inputs: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ColrefConfig {
  dialect: string;
  multiDialect: boolean;
  dialects: string[];
  resolveUnqualified: boolean;
  unresolvedPolicy: UnresolvedPolicy;
  /** Data file (.csv / .xlsx) or output directory. */
  output: string;
  /** Files and directories to scan. */
  inputs: string[];
}

export const DEFAULT_CONFIG: Readonly<ColrefConfig> = {
  dialect: DEFAULT_DIALECT,
  multiDialect: false,
  dialects: [...MULTI_DIALECT_ORDER],
  resolveUnqualified: true,
  unresolvedPolicy: "drop",
  output: path.join("output", "columns.csv"),
  inputs: ["."],
};

export function parseConfig(raw: unknown, source: string): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Read the JSON config. An explicit path must exist; without one,
 * colref.config.json in `cwd` is used when present.
 */
export function loadConfigFile(explicitPath: string | undefined, cwd: string = process.cwd()): ConfigFile | null {
  const filePath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(filePath)) {
    if (explicitPath) { throw new ConfigError(`Config file not found: ${filePath}`); }
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${errorMessage(err)}`);
  }
  return parseConfig(raw, filePath);
}

/** Defaults, then the config file, then command-line overrides. */
export function resolveConfig(file: ConfigFile | null, overrides: Partial<ColrefConfig> = {}): ColrefConfig {
  const f: ConfigFile = file ?? {};
  const inputs = overrides.inputs ?? f.inputs ?? [];
  return {
    dialect: normalizeDialect(overrides.dialect ?? f.dialect ?? DEFAULT_CONFIG.dialect),
    multiDialect: overrides.multiDialect ?? f.multiDialect ?? DEFAULT_CONFIG.multiDialect,
    dialects: (overrides.dialects ?? f.dialects ?? DEFAULT_CONFIG.dialects).map(normalizeDialect),
    resolveUnqualified: overrides.resolveUnqualified ?? f.resolveUnqualified ?? DEFAULT_CONFIG.resolveUnqualified,
    unresolvedPolicy: overrides.unresolvedPolicy ?? f.unresolvedPolicy ?? DEFAULT_CONFIG.unresolvedPolicy,
    output: overrides.output ?? f.output ?? DEFAULT_CONFIG.output,
    inputs: inputs.length > 0 ? [...inputs] : [...DEFAULT_CONFIG.inputs],
  };
}
