import type { GoFile, Token } from "../../types/types";
import { GoParser } from "./goParser";
import { BOM } from "./goScanner";

interface LineInfo {
  text: string;
  blank: boolean;
  first?: Token;
  last?: Token;
}

const isOp = (t: Token | undefined, text: string): boolean =>
  t !== undefined && t.kind === "op" && t.text === text;

const endLine = (t: Token): number => t.line + (t.text.match(/\n/g)?.length ?? 0);

const isCloser = (t: Token | undefined): boolean =>
  isOp(t, ")") || isOp(t, "]") || isOp(t, "}");

// Operators after which a statement goes on to the next line.
const CONTINUING = new Set([
  "||", "&&", "==", "!=", "<", "<=", ">", ">=",
  "+", "-", "*", "/", "%", "&", "|", "^", "<<", ">>", "&^",
  "=", ":=", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "<<=", ">>=", "&^=",
  "<-", ".",
]);

/**
 * A trailing comma continues a statement only in a case list; anywhere else
 * it ends an element of a bracketed list, which is indented by its bracket.
 */
function continuesStatement(last: Token | undefined, first: Token | undefined): boolean {
  if (!last || last.kind !== "op") return false;
  if (last.text === ",") return first !== undefined && first.kind === "keyword" && first.text === "case";
  return CONTINUING.has(last.text);
}

// `Loop:` on a line of its own
const isLabel = (code: Token[]): boolean =>
  code.length === 2 && code[0].kind === "ident" && isOp(code[1], ":");

/**
 * Re-prints Go source in a stable layout so byte offsets taken from the
 * parsed tree can be used for insertion.
 *
 * Layout rules:
 *  - tabs for indentation, recomputed from bracket nesting
 *  - `case` / `default` clauses and labels one level left of their statements
 *  - one extra level for lines continuing a statement after an operator
 *  - no trailing whitespace, at most one blank line in a row, none at the
 *    start of a block or the end of a block
 *  - one blank line after the package clause
 *  - a non-empty top-level function body never shares a line with its braces
 *  - lines inside multi-line raw strings are left alone
 */
export class GoPrinter {
  static format(src: string): string {
    const bom = src.startsWith(BOM) ? BOM : "";
    let text = src.slice(bom.length).replace(/\r\n?/g, "\n");
    let file = GoParser.parse(text);

    const expanded = this.expandBodies(text, file);
    if (expanded !== text) {
      text = expanded;
      file = GoParser.parse(text);
    }

    return bom + this.print(text, file);
  }

  /**
   * Break `func F() error { return nil }` into three lines. Inserting a
   * newline after `{` or before `}` never changes where semicolons go.
   */
  private static expandBodies(text: string, file: GoFile): string {
    const breaks: number[] = [];
    for (const fn of file.funcs) {
      if (!fn.body || fn.bodyEmpty) continue;
      const body = fn.body;
      const inner = file.tokens.filter(
        (t) => t.kind !== "semicolon" && t.start > body.start && t.end < body.end
      );
      const open = file.tokens.find((t) => t.start === body.start);
      const close = file.tokens.find((t) => isOp(t, "}") && t.end === body.end);
      if (!open || !close || inner.length === 0) continue;

      if (inner[0].line === open.line) breaks.push(open.end);
      if (endLine(inner[inner.length - 1]) === close.line) breaks.push(close.start);
    }
    if (breaks.length === 0) return text;

    let out = "";
    let pos = 0;
    for (const at of breaks.sort((a, b) => a - b)) {
      out += text.slice(pos, at) + "\n";
      pos = at;
    }
    return out + text.slice(pos);
  }

  private static print(text: string, file: GoFile): string {
    const rawLines = text.split("\n");
    const byLine = new Map<number, Token[]>();
    const rawContinuation = new Set<number>();
    const commentContinuation = new Set<number>();
    const openRawAtEnd = new Set<number>();

    for (const t of file.tokens) {
      if (t.kind === "semicolon" || t.kind === "eof") continue;
      const list = byLine.get(t.line);
      if (list) list.push(t);
      else byLine.set(t.line, [t]);

      const last = endLine(t);
      if (last > t.line) {
        const target = t.kind === "rawString" ? rawContinuation : commentContinuation;
        for (let l = t.line + 1; l <= last; l++) target.add(l);
        if (t.kind === "rawString") openRawAtEnd.add(t.line);
      }
    }

    const stack: number[] = [];
    const lines: LineInfo[] = [];
    // Indentation for the next line when the current statement continues.
    let continuation: number | undefined;

    rawLines.forEach((raw, idx) => {
      const lineNo = idx + 1;
      const toks = byLine.get(lineNo) ?? [];

      if (rawContinuation.has(lineNo)) {
        // The closing line of a raw string may also open or close brackets.
        this.track(toks, stack, stack.length ? stack[stack.length - 1] + 1 : 0);
        lines.push({ text: raw, blank: false, first: toks[0], last: toks[toks.length - 1] });
        continuation = undefined;
        return;
      }
      if (commentContinuation.has(lineNo)) {
        this.track(toks, stack, stack.length ? stack[stack.length - 1] + 1 : 0);
        lines.push({ text: raw.trimEnd(), blank: false, first: toks[0], last: toks[toks.length - 1] });
        continuation = undefined;
        return;
      }

      const content = openRawAtEnd.has(lineNo) ? raw.trimStart() : raw.trim();
      if (content === "") {
        lines.push({ text: "", blank: true });
        return;
      }

      const first = toks[0];
      const code = toks.filter((t) => t.kind !== "comment");
      const lastCode = code[code.length - 1];
      const depth = stack.length;
      const continued = continuation !== undefined && !isCloser(first);

      let indent: number;
      if (isCloser(first)) {
        indent = stack.length ? stack[stack.length - 1] : 0;
      } else if (continuation !== undefined) {
        indent = continuation;
      } else {
        indent = stack.length ? stack[stack.length - 1] + 1 : 0;
        const clause = first && first.kind === "keyword" && (first.text === "case" || first.text === "default");
        if (clause || isLabel(code)) indent = Math.max(0, indent - 1);
      }
      // `if a &&\n\t\tb {` opens its block at the statement's own level.
      this.track(toks, stack, continued && isOp(lastCode, "{") ? indent - 1 : indent);

      if (code.length > 0) {
        continuation =
          continuesStatement(lastCode, code[0]) && stack.length <= depth
            ? continued
              ? indent
              : indent + 1
            : undefined;
      }

      lines.push({
        text: "\t".repeat(indent) + content,
        blank: false,
        first,
        last: toks[toks.length - 1],
      });
    });

    const pkg = file.tokens.find((t) => t.start === file.packageName.start);
    return this.layoutBlankLines(lines, pkg ? pkg.line - 1 : -1);
  }

  /** Push the line's indentation for every opening bracket, pop on close. */
  private static track(toks: Token[], stack: number[], indent: number): void {
    for (const t of toks) {
      if (t.kind !== "op") continue;
      if (t.text === "(" || t.text === "[" || t.text === "{") stack.push(indent);
      else if (t.text === ")" || t.text === "]" || t.text === "}") stack.pop();
    }
  }

  private static layoutBlankLines(lines: LineInfo[], packageLine: number): string {
    const kept: string[] = [];
    let prev: LineInfo | undefined;
    let packageIndex = -1;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (line.blank) {
        const next = lines.slice(i + 1).find((l) => !l.blank);
        const drop =
          prev === undefined ||
          prev.blank ||
          next === undefined ||
          isOp(prev.last, "{") ||
          isOp(next.first, "}");
        if (drop) continue;
      }
      if (i === packageLine) packageIndex = kept.length;
      kept.push(line.text);
      prev = line;
    }

    if (packageIndex !== -1 && packageIndex + 1 < kept.length && kept[packageIndex + 1] !== "") {
      kept.splice(packageIndex + 1, 0, "");
    }

    return kept.join("\n") + "\n";
  }
}
