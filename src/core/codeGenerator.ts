import type { FunctionSignature } from "../types/types";
import {
  BEGIN_MARKER,
  END_MARKER,
  IMPL_PREFIX,
  IMPORT_NAME,
  INSPECT_FUNC,
  RESULT_PREFIX,
  SETUP_FUNC,
} from "../constants/markers";

/**
 * Fixed pieces of the generated Go code. Every block is bounded by the
 * marker comments so the reverse pass can find it again.
 */
const GO = {
  IMPORT: (path: string) =>
    `\n\n${BEGIN_MARKER}\nimport ${IMPORT_NAME} ${JSON.stringify(path)}\n${END_MARKER}`,
  SETUP: `\n${BEGIN_MARKER}\nvar _ = ${IMPORT_NAME}.${SETUP_FUNC}()\n${END_MARKER}\n`,
  CALL: (results: string, target: string, args: string) => `\t${results} := ${target}(${args})\n`,
  INSPECT: (name: string, results: string) =>
    `\t${IMPORT_NAME}.${INSPECT_FUNC}(${JSON.stringify(name)}, ${results})\n`,
  RETURN: (results: string) => `\treturn ${results}\n`,
  CLOSE_WRAPPER: "}\n\n",
  IMPL_HEADER: (receiver: string, name: string, typeParams: string, params: string, results: string) =>
    `func ${receiver ? receiver + " " : ""}${name}${typeParams}(${params}) ${results} {\n`,
};

/**
 * Renders the text injected into instrumented Go files.
 *
 * The function block goes right after the body's opening brace. It turns
 * the original declaration into a wrapper that calls `__<name>`, hands every
 * result to the inspector and returns them unchanged, then opens the
 * renamed implementation, which keeps the original body.
 *
 * For `func Sum(nums ...int) (int, error) {` the block reads, between the
 * BEGIN_ERRGOTRACE and END_ERRGOTRACE marker lines:
 *
 *     __result0, __result1 := __Sum(nums...)
 *     __errgotrace.InspectReturnValues("main.Sum", __result0, __result1)
 *     return __result0, __result1
 *   }
 *
 *   func __Sum(nums ...int) (int, error) {
 */
export class CodeGenerator {
  static renderImportBlock(importPath: string): string {
    return GO.IMPORT(importPath);
  }

  static renderSetupBlock(): string {
    return GO.SETUP;
  }

  static implementationName(sig: FunctionSignature): string {
    return IMPL_PREFIX + sig.workingName;
  }

  static resultPlaceholders(count: number): string[] {
    return Array.from({ length: count }, (_, i) => `${RESULT_PREFIX}${i}`);
  }

  /** Arguments for the forwarding call; variadic parameters are spread. */
  static callArguments(sig: FunctionSignature): string {
    return sig.orderedParams.map((p) => (p.isVariadic ? `${p.name}...` : p.name)).join(", ");
  }

  static callTarget(sig: FunctionSignature): string {
    const receiver = sig.receiverName ? `${sig.receiverName}.` : "";
    const typeArgs = sig.typeParams ? `[${sig.typeParams.names.join(", ")}]` : "";
    return `${receiver}${this.implementationName(sig)}${typeArgs}`;
  }

  static renderFunctionBlock(sig: FunctionSignature): string {
    const results = this.resultPlaceholders(sig.orderedResultCount).join(", ");
    const params = sig.orderedParams.map((p) => `${p.name} ${p.typeText}`).join(", ");

    return [
      `\n${BEGIN_MARKER}\n`,
      GO.CALL(results, this.callTarget(sig), this.callArguments(sig)),
      GO.INSPECT(sig.qualifiedName, results),
      GO.RETURN(results),
      GO.CLOSE_WRAPPER,
      GO.IMPL_HEADER(
        sig.receiverText,
        this.implementationName(sig),
        sig.typeParams ? `[${sig.typeParams.text}]` : "",
        params,
        sig.resultsTypeText
      ),
      `\t${END_MARKER}\n`,
    ].join("");
  }
}
