import type {
  FuncDecl,
  FunctionSignature,
  GoFile,
  InstrumentConfig,
  Param,
} from "../types/types";

export type SelectionConfig = Pick<InstrumentConfig, "filter" | "exclude" | "exportedOnly">;

const EXPORTED = /^\p{Lu}/u;

/**
 * Identifier-safe prefix for a method whose receiver has no usable name.
 *   "*T"        => "T"
 *   "T"         => "T"
 *   "*List[K]"  => "List_oK_c"
 * The pointer marker is dropped: Go does not allow T and *T to declare the
 * same method, so it never distinguishes two implementations.
 */
export function syntheticNamePrefix(receiverType: string): string {
  return receiverType
    .replace(/[()*\s]/g, "")
    .replace(/\[/g, "_o")
    .replace(/\]/g, "_c")
    .replace(/[,.]/g, "_");
}

/** package[.receiverType].name */
export function qualifiedName(packageName: string, decl: FuncDecl): string {
  const recv = decl.recv?.fields[0];
  return recv
    ? `${packageName}.${recv.type.text}.${decl.name.name}`
    : `${packageName}.${decl.name.name}`;
}

export function isSelected(name: string, identifier: string, config: SelectionConfig): boolean {
  if (!config.filter.test(name)) return false;
  if (config.exclude && config.exclude.test(name)) return false;
  if (config.exportedOnly && !EXPORTED.test(identifier)) return false;
  return true;
}

/**
 * Describe one declaration for wrapper generation, or return undefined when
 * it is not eligible: no body, no results, filtered out, excluded, or not
 * exported in exported-only mode.
 */
export function extractSignature(
  decl: FuncDecl,
  file: GoFile,
  src: string,
  config: SelectionConfig
): FunctionSignature | undefined {
  if (!decl.body || decl.bodyEmpty) return undefined;

  const results = decl.results;
  if (!results || results.fields.length === 0) return undefined;

  const name = qualifiedName(file.packageName.name, decl);
  if (!isSelected(name, decl.name.name, config)) return undefined;

  let receiverText = "";
  let receiverName = "";
  let prefix = "";
  const recvList = decl.recv;
  const recv = recvList?.fields[0];
  if (recvList && recv) {
    const recvName = recv.names[0]?.name;
    if (recvName !== undefined && recvName !== "_") {
      receiverText = src.slice(recvList.start, recvList.end);
      receiverName = recvName;
    } else {
      // A free function cannot redeclare the receiver's type parameters.
      if (recv.type.text.includes("[")) return undefined;
      prefix = syntheticNamePrefix(recv.type.text);
    }
  }

  const orderedParams: Param[] = [];
  for (const field of decl.params.fields) {
    for (const n of field.names) {
      if (n.name === "_") continue;
      orderedParams.push({ name: n.name, typeText: field.type.text, isVariadic: field.variadic });
    }
  }

  const orderedResultCount = results.fields.reduce(
    (count, field) => count + Math.max(1, field.names.length),
    0
  );

  return {
    name: decl.name.name,
    qualifiedName: name,
    workingName: prefix ? `${prefix}_${decl.name.name}` : decl.name.name,
    receiverText,
    receiverName,
    syntheticNamePrefix: prefix,
    ...(decl.typeParams && {
      typeParams: { text: decl.typeParams.text, names: decl.typeParams.names },
    }),
    orderedParams,
    orderedResultCount,
    resultsTypeText: src.slice(results.start, results.end),
    bodyOffset: decl.body.start + 1,
  };
}

export function extractSignatures(
  file: GoFile,
  src: string,
  config: SelectionConfig
): FunctionSignature[] {
  return file.funcs
    .map((decl) => extractSignature(decl, file, src, config))
    .filter((sig): sig is FunctionSignature => sig !== undefined);
}
