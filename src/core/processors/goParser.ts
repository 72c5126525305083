import type {
  Field,
  FieldList,
  FuncDecl,
  GoFile,
  Ident,
  ImportSpec,
  Token,
  TypeExpr,
  TypeParamList,
} from "../../types/types";
import { ParseError } from "../../types/errors";
import { Scanner } from "./goScanner";

const OPEN_TO_CLOSE: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

type Entry =
  | { kind: "lone"; ident: Ident }
  | { kind: "named"; ident: Ident; type: TypeExpr; variadic: boolean }
  | { kind: "type"; type: TypeExpr; variadic: boolean };

/**
 * GoParser builds a declaration-level tree of a Go source file.
 *
 * Only what instrumentation needs is modelled: the package clause, imports
 * and every top-level function with its receiver, type parameters,
 * parameters, results and body braces. Other declarations are skipped with
 * bracket balancing, function bodies are only checked for balance.
 */
export class GoParser {
  private readonly tokens: Token[];
  private readonly toks: Token[];
  private i = 0;

  constructor(private readonly src: string) {
    this.tokens = Scanner.tokenize(src);
    this.toks = this.tokens.filter((t) => t.kind !== "comment");
  }

  static parse(src: string): GoFile {
    return new GoParser(src).parseFile();
  }

  parseFile(): GoFile {
    if (!this.isKeyword("package")) {
      throw this.unexpected("package clause");
    }
    this.next();
    const packageName = this.expectIdent();
    const nl = this.src.indexOf("\n", packageName.end);
    const packageLineEnd = nl === -1 ? this.src.length : nl;
    this.expectSemi();

    const imports: ImportSpec[] = [];
    while (this.isKeyword("import")) {
      imports.push(...this.parseImportDecl());
    }

    const funcs: FuncDecl[] = [];
    while (this.peek().kind !== "eof") {
      if (this.isKeyword("func")) {
        funcs.push(this.parseFuncDecl());
      } else if (this.isKeyword("type") || this.isKeyword("var") || this.isKeyword("const")) {
        this.skipDecl();
      } else if (this.isKeyword("import")) {
        throw this.error("imports must appear before other declarations", this.peek());
      } else {
        throw this.unexpected("declaration");
      }
    }

    return { packageName, packageLineEnd, imports, funcs, tokens: this.tokens };
  }

  // --- declarations -------------------------------------------------------

  private parseImportDecl(): ImportSpec[] {
    this.next(); // import
    const specs: ImportSpec[] = [];
    if (this.isOp("(")) {
      this.next();
      while (!this.isOp(")")) {
        specs.push(this.parseImportSpec());
        if (this.peek().kind === "semicolon") this.next();
        else if (!this.isOp(")")) throw this.unexpected("; or )");
      }
      this.next();
    } else {
      specs.push(this.parseImportSpec());
    }
    this.expectSemi();
    return specs;
  }

  private parseImportSpec(): ImportSpec {
    const first = this.peek();
    let name: string | undefined;
    if (first.kind === "ident" || (first.kind === "op" && first.text === ".")) {
      name = first.text;
      this.next();
    }
    const lit = this.peek();
    if (lit.kind !== "string" && lit.kind !== "rawString") {
      throw this.unexpected("import path");
    }
    this.next();
    return {
      ...(name !== undefined && { name }),
      path: lit.text.slice(1, -1),
      start: first.start,
      end: lit.end,
    };
  }

  private parseFuncDecl(): FuncDecl {
    const start = this.next().start; // func

    let recv: FieldList | undefined;
    if (this.isOp("(")) {
      recv = this.parseFieldList();
      const count = recv.fields.reduce((n, f) => n + Math.max(1, f.names.length), 0);
      if (count !== 1) {
        throw this.error(
          count === 0 ? "method has no receiver" : "method has multiple receivers",
          this.toks[this.i - 1]
        );
      }
    }

    const name = this.expectIdent();

    let typeParams: TypeParamList | undefined;
    if (!recv && this.isOp("[")) {
      typeParams = this.parseTypeParams();
    }

    if (!this.isOp("(")) throw this.unexpected("(");
    const params = this.parseFieldList();

    let results: FieldList | undefined;
    if (this.isOp("(")) {
      results = this.parseFieldList();
    } else if (this.canStartType(this.peek())) {
      const type = this.parseType();
      results = {
        start: type.start,
        end: type.end,
        parenthesized: false,
        fields: [{ names: [], type, variadic: false }],
      };
    }

    let body: FuncDecl["body"];
    let bodyEmpty = true;
    if (this.isOp("{")) {
      const open = this.peek();
      const close = this.skipBalanced();
      body = { start: open.start, end: close.end };
      bodyEmpty = this.src.slice(open.end, close.start).trim() === "";
    }
    const end = this.toks[this.i - 1].end;
    this.expectSemi();

    return {
      start,
      end,
      name,
      ...(recv && { recv }),
      ...(typeParams && { typeParams }),
      params,
      ...(results && { results }),
      ...(body && { body }),
      bodyEmpty,
    };
  }

  private skipDecl(): void {
    this.next(); // type | var | const
    while (this.peek().kind !== "semicolon" && this.peek().kind !== "eof") {
      const t = this.peek();
      if (t.kind === "op" && t.text in OPEN_TO_CLOSE) {
        this.skipBalanced();
      } else if (t.kind === "op" && (t.text === ")" || t.text === "]" || t.text === "}")) {
        throw this.unexpected("declaration");
      } else {
        this.next();
      }
    }
    this.expectSemi();
  }

  // --- field lists and types ----------------------------------------------

  /**
   * Parse a parenthesized parameter, result or receiver list.
   *   (a, b int, c string)   => 2 fields, names [a b] and [c]
   *   (int, error)           => 2 unnamed fields
   *   (format string, args ...any)
   */
  private parseFieldList(): FieldList {
    const open = this.next(); // (
    const entries: Entry[] = [];

    while (!this.isOp(")")) {
      entries.push(this.parseEntry());
      if (this.isOp(",")) {
        this.next();
      } else if (!this.isOp(")")) {
        throw this.unexpected(", or )");
      }
    }
    const close = this.next();

    return {
      start: open.start,
      end: close.end,
      parenthesized: true,
      fields: this.groupEntries(entries, open),
    };
  }

  private parseEntry(): Entry {
    const t = this.peek();
    if (t.kind === "ident") {
      const after = this.toks[this.i + 1];
      const ident: Ident = { name: t.text, start: t.start, end: t.end };
      if (after.kind === "op" && (after.text === "," || after.text === ")")) {
        this.next();
        return { kind: "lone", ident };
      }
      if (after.kind === "op" && after.text === "[" && !this.isArrayAfterName()) {
        return { kind: "type", type: this.parseType(), variadic: false };
      }
      if (after.kind === "op" && after.text === ".") {
        return { kind: "type", type: this.parseType(), variadic: false };
      }
      this.next();
      const variadic = this.isOp("...");
      return { kind: "named", ident, type: this.parseType(true), variadic };
    }
    const variadic = this.isOp("...");
    return { kind: "type", type: this.parseType(true), variadic };
  }

  // `a [4]int` and `a []int` declare a name, `List[int]` instantiates a type.
  private isArrayAfterName(): boolean {
    let depth = 0;
    for (let j = this.i + 1; j < this.toks.length; j++) {
      const t = this.toks[j];
      if (t.kind === "op" && t.text === "[") depth++;
      else if (t.kind === "op" && t.text === "]") {
        depth--;
        if (depth === 0) {
          const after = this.toks[j + 1];
          return after !== undefined && this.canStartType(after);
        }
      } else if (t.kind === "eof") {
        return false;
      }
    }
    return false;
  }

  private groupEntries(entries: Entry[], at: Token): Field[] {
    const named = entries.some((e) => e.kind === "named");
    if (!named) {
      return entries.map((e): Field =>
        e.kind === "lone"
          ? {
              names: [],
              type: { text: e.ident.name, start: e.ident.start, end: e.ident.end },
              variadic: false,
            }
          : e.kind === "type"
            ? { names: [], type: e.type, variadic: e.variadic }
            : { names: [e.ident], type: e.type, variadic: e.variadic }
      );
    }

    const fields: Field[] = [];
    let pending: Ident[] = [];
    for (const e of entries) {
      if (e.kind === "lone") {
        pending.push(e.ident);
      } else if (e.kind === "named") {
        fields.push({ names: [...pending, e.ident], type: e.type, variadic: e.variadic });
        pending = [];
      } else {
        throw this.error("mixed named and unnamed parameters", at);
      }
    }
    if (pending.length > 0) {
      throw this.error("mixed named and unnamed parameters", at);
    }
    return fields;
  }

  private parseTypeParams(): TypeParamList {
    const open = this.peek();
    const close = this.skipBalanced();
    const inner = this.toks.filter((t) => t.start > open.start && t.end < close.end);

    const names: string[] = [];
    let depth = 0;
    let entryStart = true;
    for (const t of inner) {
      if (entryStart) {
        if (t.kind !== "ident") throw this.error("expected type parameter name", t);
        names.push(t.text);
        entryStart = false;
        continue;
      }
      if (t.kind === "op" && t.text in OPEN_TO_CLOSE) depth++;
      else if (t.kind === "op" && (t.text === ")" || t.text === "]" || t.text === "}")) depth--;
      else if (depth === 0 && t.kind === "op" && t.text === ",") entryStart = true;
    }
    if (names.length === 0) throw this.error("empty type parameter list", open);

    return {
      start: open.start,
      end: close.end,
      text: this.src.slice(open.end, close.start).trim(),
      names,
    };
  }

  private canStartType(t: Token): boolean {
    if (t.kind === "ident") return true;
    if (t.kind === "keyword") {
      return ["map", "chan", "func", "struct", "interface"].includes(t.text);
    }
    return t.kind === "op" && ["*", "[", "(", "<-"].includes(t.text);
  }

  /** Consume one type expression and return its source text and span. */
  private parseType(allowVariadic = false): TypeExpr {
    const first = this.peek();
    if (allowVariadic && this.isOp("...")) this.next();
    this.consumeType();
    const last = this.toks[this.i - 1];
    return {
      text: this.src.slice(first.start, last.end),
      start: first.start,
      end: last.end,
    };
  }

  private consumeType(): void {
    const t = this.peek();

    if (t.kind === "ident") {
      this.next();
      if (this.isOp(".")) {
        this.next();
        this.expectIdent();
      }
      if (this.isOp("[")) this.skipBalanced(); // type arguments
      return;
    }

    if (t.kind === "op") {
      switch (t.text) {
        case "*":
          this.next();
          return this.consumeType();
        case "[":
          this.skipBalanced();
          return this.consumeType();
        case "(":
          this.skipBalanced();
          return;
        case "<-":
          this.next();
          if (!this.isKeyword("chan")) throw this.unexpected("chan");
          this.next();
          return this.consumeType();
      }
    }

    if (t.kind === "keyword") {
      switch (t.text) {
        case "map":
          this.next();
          if (!this.isOp("[")) throw this.unexpected("[");
          this.skipBalanced();
          return this.consumeType();
        case "chan":
          this.next();
          if (this.isOp("<-")) this.next();
          return this.consumeType();
        case "struct":
        case "interface":
          this.next();
          if (!this.isOp("{")) throw this.unexpected("{");
          this.skipBalanced();
          return;
        case "func":
          this.next();
          if (!this.isOp("(")) throw this.unexpected("(");
          this.skipBalanced();
          if (this.isOp("(")) this.skipBalanced();
          else if (this.canStartType(this.peek())) this.consumeType();
          return;
      }
    }

    throw this.unexpected("type");
  }

  // --- token helpers ------------------------------------------------------

  /**
   * Consume a bracketed group starting at the current opening token and
   * return the matching closing token. Mismatched brackets are errors.
   */
  private skipBalanced(): Token {
    const stack: string[] = [];
    while (true) {
      const t = this.next();
      if (t.kind === "eof") {
        throw this.error(`expected ${stack[stack.length - 1] ?? "}"}, found EOF`, t);
      }
      if (t.kind !== "op") continue;
      if (t.text in OPEN_TO_CLOSE) {
        stack.push(OPEN_TO_CLOSE[t.text]);
      } else if (t.text === ")" || t.text === "]" || t.text === "}") {
        const want = stack.pop();
        if (want !== t.text) {
          throw this.error(`unexpected ${t.text}, expected ${want ?? "declaration"}`, t);
        }
        if (stack.length === 0) return t;
      }
    }
  }

  private peek(): Token {
    return this.toks[this.i];
  }

  private next(): Token {
    const t = this.toks[this.i];
    if (t.kind !== "eof") this.i++;
    return t;
  }

  private isOp(text: string): boolean {
    const t = this.peek();
    return t.kind === "op" && t.text === text;
  }

  private isKeyword(text: string): boolean {
    const t = this.peek();
    return t.kind === "keyword" && t.text === text;
  }

  private expectIdent(): Ident {
    const t = this.peek();
    if (t.kind !== "ident") throw this.unexpected("name");
    this.next();
    return { name: t.text, start: t.start, end: t.end };
  }

  private expectSemi(): void {
    const t = this.peek();
    if (t.kind === "semicolon") {
      this.next();
      return;
    }
    if (t.kind !== "eof") throw this.unexpected("; or newline");
  }

  private unexpected(expected: string): ParseError {
    const t = this.peek();
    const found =
      t.kind === "eof" ? "EOF" : t.kind === "semicolon" && t.auto ? "newline" : t.text;
    return this.error(`expected ${expected}, found ${found}`, t);
  }

  private error(reason: string, at: Token): ParseError {
    return new ParseError(reason, at.line, at.column);
  }
}
