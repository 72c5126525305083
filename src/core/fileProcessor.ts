import { chmod, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { FileResult, InstrumentConfig } from "../types/types";
import { ErrgotraceError, FileIOError, errorMessage } from "../types/errors";
import { c, log } from "../constants/log";
import { instrumentSource } from "./instrumenter";
import { stripInstrumentation } from "./reverser";

export type Output = (text: string) => void;

const stdout: Output = (text) => {
  process.stdout.write(text);
};

async function readSource(file: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (error) {
    throw new FileIOError(file, "open", errorMessage(error));
  }
}

/**
 * Replace the file through a temporary sibling and a rename, so a reader
 * never sees a half-written file. The replacement keeps the file's mode.
 */
async function writeSource(file: string, text: string): Promise<void> {
  const tmp = join(dirname(file), `.${basename(file)}.errgotrace.tmp`);
  try {
    const { mode } = await stat(file);
    await writeFile(tmp, text, "utf8");
    // chmod, not a writeFile mode, which the umask would narrow
    await chmod(tmp, mode & 0o7777);
    await rename(tmp, file);
  } catch (error) {
    await unlink(tmp).catch(() => undefined);
    throw new FileIOError(file, "write", errorMessage(error));
  }
}

/**
 * Instrument or strip one file, then write it back or print it.
 * Throws on any failure; nothing is written unless the transform succeeded.
 */
export async function processFile(
  file: string,
  config: InstrumentConfig,
  out: Output = stdout
): Promise<FileResult> {
  const source = await readSource(file);

  let text: string;
  let instrumented: number | undefined;
  if (config.reverse) {
    text = stripInstrumentation(source);
  } else {
    const result = instrumentSource(file, source, config);
    text = result.source;
    instrumented = result.signatures.length;
  }

  if (config.write) {
    await writeSource(file, text);
  } else {
    out(text);
  }

  return { path: file, ok: true, ...(instrumented !== undefined && { instrumented }) };
}

/**
 * Process files one after another. A failing file is reported and skipped;
 * `failed` tells whether any file failed.
 */
export async function processFiles(
  files: string[],
  config: InstrumentConfig,
  out: Output = stdout
): Promise<{ failed: boolean; results: FileResult[] }> {
  const results: FileResult[] = [];

  for (const file of files) {
    try {
      const result = await processFile(file, config, out);
      results.push(result);
      if (config.verbose) {
        const detail = config.reverse
          ? "stripped"
          : `${result.instrumented ?? 0} function${result.instrumented === 1 ? "" : "s"}`;
        log.ok(`${file} ${c.dim(`[${detail}]`)}`);
      }
    } catch (error) {
      // Our own errors already name the file.
      const message =
        error instanceof ErrgotraceError ? error.message : `${file}: ${errorMessage(error)}`;
      log.fail(message);
      results.push({ path: file, ok: false, error: message });
    }
  }

  return { failed: results.some((r) => !r.ok), results };
}
