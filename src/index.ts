export { GoParser } from "./core/processors/goParser";
export { GoPrinter } from "./core/processors/goPrinter";
export { Scanner } from "./core/processors/goScanner";
export {
  extractSignature,
  extractSignatures,
  qualifiedName,
  syntheticNamePrefix,
} from "./core/signatureExtractor";
export { CodeGenerator } from "./core/codeGenerator";
export { EditList } from "./core/editList";
export { assertNotInstrumented, instrumentSource, planEdits } from "./core/instrumenter";
export { stripInstrumentation } from "./core/reverser";
export { createConfig } from "./core/config";
export { processFile, processFiles } from "./core/fileProcessor";
export * from "./types/errors";
export type * from "./types/types";
