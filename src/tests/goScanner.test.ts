import { describe, it, expect } from "vitest";
import { Scanner } from "../core/processors/goScanner";
import { ParseError } from "../types/errors";

const kinds = (src: string) =>
  Scanner.tokenize(src).map((t) => (t.kind === "semicolon" && t.auto ? "auto;" : t.kind));

describe("Scanner", () => {
  it("should tokenize a package clause and a function", () => {
    const tokens = Scanner.tokenize("package main\n\nfunc F() {}\n");
    expect(tokens.map((t) => t.text)).toEqual([
      "package", "main", "", "func", "F", "(", ")", "{", "}", "", "",
    ]);
    expect(tokens[1]).toMatchObject({ kind: "ident", start: 8, end: 12, line: 1, column: 9 });
    expect(tokens[3]).toMatchObject({ kind: "keyword", line: 3, column: 1 });
  });

  it("should skip a leading byte order mark", () => {
    const [pkg, name] = Scanner.tokenize("\uFEFFpackage main\n");
    expect(pkg).toMatchObject({ kind: "keyword", start: 1, line: 1, column: 1 });
    expect(name).toMatchObject({ start: 9, column: 9 });
    expect(() => Scanner.tokenize("package\uFEFF main\n")).toThrow('1:8: illegal character "\uFEFF"');
  });

  it("should insert semicolons only after line-ending tokens", () => {
    expect(kinds("x++\n")).toEqual(["ident", "op", "auto;", "eof"]);
    expect(kinds("a +\nb\n")).toEqual(["ident", "op", "ident", "auto;", "eof"]);
    expect(kinds("return\n")).toEqual(["keyword", "auto;", "eof"]);
    expect(kinds("func\n")).toEqual(["keyword", "eof"]);
  });

  it("should insert a semicolon at end of file", () => {
    expect(kinds("}")).toEqual(["op", "auto;", "eof"]);
  });

  it("should treat a multi-line general comment as a newline", () => {
    expect(kinds("a /* x\n */ b")).toEqual(["ident", "auto;", "comment", "ident", "auto;", "eof"]);
    expect(kinds("a /* x */ b")).toEqual(["ident", "comment", "ident", "auto;", "eof"]);
  });

  it("should scan literals", () => {
    const tokens = Scanner.tokenize("1 0x1F 1.5 1e3 2i 'a' '\\n' \"s\\\"q\" `raw\nline`");
    expect(tokens.slice(0, 9).map((t) => [t.kind, t.text])).toEqual([
      ["int", "1"],
      ["int", "0x1F"],
      ["float", "1.5"],
      ["float", "1e3"],
      ["imag", "2i"],
      ["rune", "'a'"],
      ["rune", "'\\n'"],
      ["string", '"s\\"q"'],
      ["rawString", "`raw\nline`"],
    ]);
  });

  it("should prefer the longest operator", () => {
    const ops = Scanner.tokenize("a <<= b... &^ c <- d")
      .filter((t) => t.kind === "op")
      .map((t) => t.text);
    expect(ops).toEqual(["<<=", "...", "&^", "<-"]);
  });

  it("should keep comments in the stream", () => {
    const tokens = Scanner.tokenize("// header\npackage p");
    expect(tokens[0]).toMatchObject({ kind: "comment", text: "// header", line: 1 });
    expect(tokens[1]).toMatchObject({ kind: "keyword", text: "package", line: 2 });
  });

  it("should report unterminated literals with their position", () => {
    expect(() => Scanner.tokenize('x := "abc\n')).toThrow(ParseError);
    expect(() => Scanner.tokenize('x := "abc\n')).toThrow("1:6: string literal not terminated");
    expect(() => Scanner.tokenize("a\n/* never closed")).toThrow("2:1: comment not terminated");
    expect(() => Scanner.tokenize("s := `open")).toThrow("raw string literal not terminated");
    expect(() => Scanner.tokenize("r := ''")).toThrow("empty rune literal");
  });

  it("should reject illegal characters", () => {
    expect(() => Scanner.tokenize("a @ b")).toThrow('1:3: illegal character "@"');
  });
});
