import { Command } from "commander";
import { createConfig, type CliOptions } from "../core/config";
import { expandPaths, reportUnreadableDir } from "../core/fileWalker";
import { processFiles } from "../core/fileProcessor";
import { errorMessage } from "../types/errors";
import type { InstrumentConfig } from "../types/types";
import { DEFAULT_IMPORT_PATH } from "../constants/markers";
import { c, log, sym } from "../constants/log";

const VERSION = "0.1.0";

const EXAMPLES = `
Examples:
  Add tracing code to all go files in the current directory.
  $ errgotrace -w .

  Add tracing code to exported functions of one package, skipping mocks.
  $ errgotrace -w --exported --exclude 'Mock' ./internal/store

  Remove all tracing code from all go files in the current directory.
  $ errgotrace -w -r .
`;

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("errgotrace")
    .description("Modifies go files to include code for tracing go errors.")
    .version(VERSION)
    .argument("[paths...]", "Go source files or directories")
    .option("-w, --write", "re-write files in place", false)
    .option("-r, --reverse", "reverse the process, remove tracing code", false)
    .option("--exported", "only annotate exported functions", false)
    .option("--filter <regex>", "only annotate functions matching the regular expression", ".")
    .option("--exclude <regex>", "exclude any matching functions, takes precedence over filter", "")
    .option("--import-path <path>", "go import path of the tracing support package", DEFAULT_IMPORT_PATH)
    .option("-v, --verbose", "report every processed file on stderr", false)
    .addHelpText("after", EXAMPLES);

  return program;
}

/** Run the CLI and resolve to the process exit code. */
export async function run(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);

  const paths = program.args;
  if (paths.length === 0) {
    program.outputHelp();
    return 1;
  }

  const options = program.opts<CliOptions>();
  let config: InstrumentConfig;
  try {
    config = createConfig(options);
  } catch (error) {
    log.fail(errorMessage(error));
    return 1;
  }

  const start = performance.now();
  let unreadable = false;
  const files = await expandPaths(paths, {
    onError: (dir, error) => {
      unreadable = true;
      reportUnreadableDir(dir, error);
    },
  });
  if (files.length === 0) {
    log.warn("No go files found.");
    return unreadable ? 1 : 0;
  }

  const { failed, results } = await processFiles(files, config);

  if (config.verbose) {
    const failures = results.filter((r) => !r.ok).length;
    const functions = results.reduce((n, r) => n + (r.instrumented ?? 0), 0);
    const ms = performance.now() - start;
    console.error(
      [
        `${sym.info} Summary`,
        `  ${sym.dot} Files:     ${c.bold(results.length.toString())}`,
        `  ${sym.dot} Failed:    ${c.bold(failures.toString())}`,
        ...(config.reverse ? [] : [`  ${sym.dot} Functions: ${c.bold(functions.toString())}`]),
        `  ${sym.dot} Mode:      ${config.reverse ? "reverse" : "instrument"}${config.write ? " (in place)" : ""}`,
        `  ${sym.dot} Elapsed:   ${c.bold(ms.toFixed(0) + "ms")}`,
      ].join("\n")
    );
  }

  return failed || unreadable ? 1 : 0;
}

