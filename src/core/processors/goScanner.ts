import type { Token, TokenKind } from "../../types/types";
import { ParseError } from "../../types/errors";

export const KEYWORDS = new Set([
  "break",
  "case",
  "chan",
  "const",
  "continue",
  "default",
  "defer",
  "else",
  "fallthrough",
  "for",
  "func",
  "go",
  "goto",
  "if",
  "import",
  "interface",
  "map",
  "package",
  "range",
  "return",
  "select",
  "struct",
  "switch",
  "type",
  "var",
]);

// Longest first, so a prefix never shadows a longer operator.
const OPERATORS = [
  "<<=", ">>=", "&^=", "...",
  "&&", "||", "<-", "++", "--", "==", "!=", "<=", ">=", ":=",
  "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "<<", ">>", "&^",
  "+", "-", "*", "/", "%", "&", "|", "^", "<", ">", "=", "!", "~",
  "(", ")", "[", "]", "{", "}", ",", ".", ":",
];

const NUMBER =
  /(?:0[xX][0-9a-fA-F_]*(?:\.[0-9a-fA-F_]*)?(?:[pP][+-]?[0-9_]+)?|0[bBoO][0-9_]+|[0-9][0-9_]*(?:\.[0-9_]*)?(?:[eE][+-]?[0-9_]+)?|\.[0-9][0-9_]*(?:[eE][+-]?[0-9_]+)?)i?/y;

// A byte order mark is allowed only as the very first character.
export const BOM = "\uFEFF";

const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{Nd}_]/u;

/**
 * Go tokenizer with automatic semicolon insertion.
 *
 * Comments are kept in the stream so the printer can see them; the parser
 * skips them. Auto semicolons sit at the offset of the newline that
 * produced them and have empty text.
 */
export class Scanner {
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  private insertSemi = false;
  private readonly tokens: Token[] = [];

  constructor(private readonly src: string) {}

  static tokenize(src: string): Token[] {
    return new Scanner(src).run();
  }

  private run(): Token[] {
    const src = this.src;
    if (src.startsWith(BOM)) {
      this.pos = this.lineStart = BOM.length;
    }
    while (this.pos < src.length) {
      const ch = src[this.pos];

      if (ch === "\n") {
        this.newline();
        continue;
      }
      if (ch === " " || ch === "\t" || ch === "\r") {
        this.pos++;
        continue;
      }

      if (ch === "/" && src[this.pos + 1] === "/") {
        const end = src.indexOf("\n", this.pos);
        const stop = end === -1 ? src.length : end;
        this.autoSemi(this.pos);
        this.push("comment", this.pos, stop);
        this.pos = stop;
        continue;
      }

      if (ch === "/" && src[this.pos + 1] === "*") {
        this.generalComment();
        continue;
      }

      if (IDENT_START.test(ch)) {
        let end = this.pos + 1;
        while (end < src.length && IDENT_PART.test(src[end])) end++;
        const text = src.slice(this.pos, end);
        const isKeyword = KEYWORDS.has(text);
        this.push(isKeyword ? "keyword" : "ident", this.pos, end);
        this.insertSemi =
          !isKeyword ||
          text === "break" ||
          text === "continue" ||
          text === "fallthrough" ||
          text === "return";
        this.pos = end;
        continue;
      }

      if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(src[this.pos + 1] ?? ""))) {
        NUMBER.lastIndex = this.pos;
        const m = NUMBER.exec(src);
        const text = m ? m[0] : ch;
        const kind: TokenKind = text.endsWith("i")
          ? "imag"
          : /^0[xX]/.test(text)
            ? /[.pP]/.test(text) ? "float" : "int"
            : /[.eE]/.test(text) ? "float" : "int";
        this.push(kind, this.pos, this.pos + text.length);
        this.insertSemi = true;
        this.pos += text.length;
        continue;
      }

      if (ch === '"' || ch === "'") {
        this.quoted(ch);
        continue;
      }

      if (ch === "`") {
        this.rawString();
        continue;
      }

      if (ch === ";") {
        this.push("semicolon", this.pos, this.pos + 1);
        this.insertSemi = false;
        this.pos++;
        continue;
      }

      const op = OPERATORS.find((o) => src.startsWith(o, this.pos));
      if (!op) {
        throw this.error(`illegal character ${JSON.stringify(ch)}`, this.pos);
      }
      this.push("op", this.pos, this.pos + op.length);
      this.insertSemi = op === ")" || op === "]" || op === "}" || op === "++" || op === "--";
      this.pos += op.length;
    }

    this.autoSemi(this.pos);
    this.tokens.push({
      kind: "eof",
      text: "",
      start: this.pos,
      end: this.pos,
      line: this.line,
      column: this.pos - this.lineStart + 1,
    });
    return this.tokens;
  }

  private newline(): void {
    this.autoSemi(this.pos);
    this.pos++;
    this.line++;
    this.lineStart = this.pos;
  }

  private autoSemi(at: number): void {
    if (!this.insertSemi) return;
    this.insertSemi = false;
    this.tokens.push({
      kind: "semicolon",
      text: "",
      start: at,
      end: at,
      line: this.line,
      column: at - this.lineStart + 1,
      auto: true,
    });
  }

  private generalComment(): void {
    const start = this.pos;
    const close = this.src.indexOf("*/", start + 2);
    if (close === -1) throw this.error("comment not terminated", start);
    const end = close + 2;
    const body = this.src.slice(start, end);
    // A general comment spanning lines acts like a newline.
    if (body.includes("\n")) this.autoSemi(start);
    this.push("comment", start, end);
    this.advanceLines(start, end);
    this.pos = end;
  }

  private quoted(quote: string): void {
    const start = this.pos;
    let i = start + 1;
    while (true) {
      const c = this.src[i];
      if (c === undefined || c === "\n") {
        throw this.error(
          quote === '"' ? "string literal not terminated" : "rune literal not terminated",
          start
        );
      }
      if (c === "\\") {
        i += 2;
        continue;
      }
      if (c === quote) break;
      i++;
    }
    const end = i + 1;
    if (quote === "'" && end - start === 2) {
      throw this.error("empty rune literal or unescaped ' in rune literal", start);
    }
    this.push(quote === '"' ? "string" : "rune", start, end);
    this.insertSemi = true;
    this.pos = end;
  }

  private rawString(): void {
    const start = this.pos;
    const close = this.src.indexOf("`", start + 1);
    if (close === -1) throw this.error("raw string literal not terminated", start);
    const end = close + 1;
    this.push("rawString", start, end);
    this.advanceLines(start, end);
    this.insertSemi = true;
    this.pos = end;
  }

  // Token positions are taken before the lines inside the literal are counted.
  private advanceLines(start: number, end: number): void {
    for (let i = start; i < end; i++) {
      if (this.src[i] === "\n") {
        this.line++;
        this.lineStart = i + 1;
      }
    }
  }

  private push(kind: TokenKind, start: number, end: number): void {
    this.tokens.push({
      kind,
      text: this.src.slice(start, end),
      start,
      end,
      line: this.line,
      column: start - this.lineStart + 1,
    });
  }

  private error(reason: string, offset: number): ParseError {
    return new ParseError(reason, this.line, offset - this.lineStart + 1);
  }
}
