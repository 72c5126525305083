import type { InstrumentConfig } from "../types/types";
import { ConfigError } from "../types/errors";
import { DEFAULT_IMPORT_PATH } from "../constants/markers";

export interface CliOptions {
  write?: boolean;
  reverse?: boolean;
  exported?: boolean;
  filter?: string;
  exclude?: string;
  importPath?: string;
  verbose?: boolean;
}

function compile(flag: string, pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`error in ${flag} regex (${reason})`);
  }
}

/**
 * Build the run configuration once, before any file is touched. An empty
 * exclude pattern means nothing is excluded.
 */
export function createConfig(options: CliOptions): InstrumentConfig {
  const exclude = options.exclude ? compile("exclude", options.exclude) : undefined;
  const importPath = options.importPath ?? DEFAULT_IMPORT_PATH;
  if (!/^[^\s"`\\]+$/.test(importPath)) {
    throw new ConfigError(`invalid import path ${JSON.stringify(importPath)}`);
  }

  return Object.freeze({
    filter: compile("filter", options.filter ?? "."),
    ...(exclude && { exclude }),
    exportedOnly: options.exported ?? false,
    write: options.write ?? false,
    reverse: options.reverse ?? false,
    importPath,
    verbose: options.verbose ?? false,
  });
}
