export type TokenKind =
  | "ident"
  | "keyword"
  | "int"
  | "float"
  | "imag"
  | "rune"
  | "string"
  | "rawString"
  | "op"
  | "semicolon"
  | "comment"
  | "eof";

export interface Token {
  kind: TokenKind;
  text: string;
  start: number;
  end: number;
  line: number;
  column: number;
  auto?: boolean; // semicolon inserted at a newline or at EOF
}

export interface Span {
  start: number;
  end: number;
}

export interface Ident extends Span {
  name: string;
}

export interface TypeExpr extends Span {
  text: string;
}

export interface Field {
  names: Ident[];
  type: TypeExpr;
  variadic: boolean;
}

export interface FieldList extends Span {
  fields: Field[];
  parenthesized: boolean;
}

export interface TypeParamList extends Span {
  text: string; // text between the brackets
  names: string[];
}

export interface FuncDecl extends Span {
  name: Ident;
  recv?: FieldList;
  typeParams?: TypeParamList;
  params: FieldList;
  results?: FieldList;
  body?: Span; // offsets of '{' and just past '}'
  bodyEmpty: boolean;
}

export interface ImportSpec extends Span {
  name?: string;
  path: string;
}

export interface GoFile {
  packageName: Ident;
  packageLineEnd: number; // offset of the newline ending the package clause
  imports: ImportSpec[];
  funcs: FuncDecl[];
  tokens: Token[];
}

export interface Param {
  name: string;
  typeText: string;
  isVariadic: boolean;
}

export interface FunctionSignature {
  name: string;
  qualifiedName: string;
  workingName: string;
  receiverText: string;
  receiverName: string;
  syntheticNamePrefix: string;
  typeParams?: { text: string; names: string[] };
  orderedParams: Param[];
  orderedResultCount: number;
  resultsTypeText: string;
  bodyOffset: number;
}

export interface Edit {
  offset: number;
  text: string;
}

export interface InstrumentConfig {
  readonly filter: RegExp;
  readonly exclude?: RegExp;
  readonly exportedOnly: boolean;
  readonly write: boolean;
  readonly reverse: boolean;
  readonly importPath: string;
  readonly verbose: boolean;
}

export interface InstrumentResult {
  source: string;
  signatures: FunctionSignature[];
}

export interface FileResult {
  path: string;
  ok: boolean;
  instrumented?: number;
  error?: string;
}
