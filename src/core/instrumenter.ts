import type { GoFile, InstrumentConfig, InstrumentResult } from "../types/types";
import { AlreadyProcessedError, FormatError, ParseError } from "../types/errors";
import { IMPORT_NAME } from "../constants/markers";
import { GoParser } from "./processors/goParser";
import { GoPrinter } from "./processors/goPrinter";
import { extractSignatures } from "./signatureExtractor";
import { CodeGenerator } from "./codeGenerator";
import { EditList } from "./editList";

export type InstrumentOptions = Pick<
  InstrumentConfig,
  "filter" | "exclude" | "exportedOnly" | "importPath"
>;

/** Refuse files that already import the support package under our alias. */
export function assertNotInstrumented(file: GoFile, filename: string): void {
  if (file.imports.some((imp) => imp.name === IMPORT_NAME)) {
    throw new AlreadyProcessedError(filename);
  }
}

function canonicalize(filename: string, src: string, stage?: string): string {
  try {
    return GoPrinter.format(src);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new FormatError(filename, stage ? `${stage}: ${error.message}` : error.message);
    }
    throw error;
  }
}

/**
 * Plan the insertions for one canonical file: the import right after the
 * package clause line, then one block per eligible function in source order.
 */
export function planEdits(
  file: GoFile,
  canonical: string,
  options: InstrumentOptions
): { edits: EditList; signatures: InstrumentResult["signatures"] } {
  const edits = new EditList();
  edits.add(file.packageLineEnd, CodeGenerator.renderImportBlock(options.importPath));

  const signatures = extractSignatures(file, canonical, options);
  for (const sig of signatures) {
    edits.add(sig.bodyOffset, CodeGenerator.renderFunctionBlock(sig));
  }
  return { edits, signatures };
}

/**
 * Add tracing code to the contents of a Go file.
 *
 * The source is canonicalized first so the offsets taken from the parsed
 * tree point into the same text the edits are merged into.
 */
export function instrumentSource(
  filename: string,
  source: string,
  options: InstrumentOptions
): InstrumentResult {
  const canonical = canonicalize(filename, source);
  const file = GoParser.parse(canonical);

  assertNotInstrumented(file, filename);

  const { edits, signatures } = planEdits(file, canonical, options);
  const merged = edits.apply(canonical) + CodeGenerator.renderSetupBlock();

  return {
    source: canonicalize(filename, merged, "generated code"),
    signatures,
  };
}
