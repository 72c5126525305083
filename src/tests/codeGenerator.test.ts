import { describe, it, expect } from "vitest";
import { CodeGenerator } from "../core/codeGenerator";
import type { FunctionSignature } from "../types/types";

const signature = (overrides: Partial<FunctionSignature>): FunctionSignature => ({
  name: "F",
  qualifiedName: "main.F",
  workingName: "F",
  receiverText: "",
  receiverName: "",
  syntheticNamePrefix: "",
  orderedParams: [],
  orderedResultCount: 1,
  resultsTypeText: "error",
  bodyOffset: 0,
  ...overrides,
});

describe("CodeGenerator", () => {
  it("should render the wrapper and implementation header", () => {
    const sig = signature({
      name: "Sum",
      qualifiedName: "main.Sum",
      workingName: "Sum",
      orderedParams: [{ name: "nums", typeText: "...int", isVariadic: true }],
      orderedResultCount: 2,
      resultsTypeText: "(int, error)",
    });
    expect(CodeGenerator.renderFunctionBlock(sig)).toBe(
      [
        "",
        "/* BEGIN_ERRGOTRACE */",
        "\t__result0, __result1 := __Sum(nums...)",
        '\t__errgotrace.InspectReturnValues("main.Sum", __result0, __result1)',
        "\treturn __result0, __result1",
        "}",
        "",
        "func __Sum(nums ...int) (int, error) {",
        "\t/* END_ERRGOTRACE */",
        "",
      ].join("\n")
    );
  });

  it("should forward plain parameters without a spread", () => {
    const sig = signature({
      orderedParams: [
        { name: "a", typeText: "int", isVariadic: false },
        { name: "b", typeText: "int", isVariadic: false },
      ],
    });
    expect(CodeGenerator.callArguments(sig)).toBe("a, b");
  });

  it("should forward nothing when every parameter is discarded", () => {
    const block = CodeGenerator.renderFunctionBlock(signature({}));
    expect(block).toContain("\t__result0 := __F()\n");
    expect(block).toContain("func __F() error {\n");
  });

  it("should call through a named receiver", () => {
    const sig = signature({
      name: "Handle",
      qualifiedName: "server.*Server.Handle",
      workingName: "Handle",
      receiverText: "(s *Server)",
      receiverName: "s",
      orderedParams: [{ name: "req", typeText: "string", isVariadic: false }],
    });
    const block = CodeGenerator.renderFunctionBlock(sig);
    expect(block).toContain("\t__result0 := s.__Handle(req)\n");
    expect(block).toContain('\t__errgotrace.InspectReturnValues("server.*Server.Handle", __result0)\n');
    expect(block).toContain("func (s *Server) __Handle(req string) error {\n");
  });

  it("should turn unnamed receivers into a free implementation", () => {
    const sig = signature({
      name: "Method",
      qualifiedName: "shapes.*T.Method",
      workingName: "T_Method",
      syntheticNamePrefix: "T",
      orderedResultCount: 2,
      resultsTypeText: "(int, error)",
    });
    expect(CodeGenerator.implementationName(sig)).toBe("__T_Method");
    const block = CodeGenerator.renderFunctionBlock(sig);
    expect(block).toContain("\t__result0, __result1 := __T_Method()\n");
    expect(block).toContain("func __T_Method() (int, error) {\n");
  });

  it("should redeclare and instantiate type parameters", () => {
    const sig = signature({
      name: "Map",
      workingName: "Map",
      typeParams: { text: "T any, U any", names: ["T", "U"] },
      orderedParams: [
        { name: "xs", typeText: "[]T", isVariadic: false },
        { name: "f", typeText: "func(T) U", isVariadic: false },
      ],
      resultsTypeText: "([]U, error)",
      orderedResultCount: 2,
    });
    expect(CodeGenerator.callTarget(sig)).toBe("__Map[T, U]");
    expect(CodeGenerator.renderFunctionBlock(sig)).toContain(
      "func __Map[T any, U any](xs []T, f func(T) U) ([]U, error) {\n"
    );
  });

  it("should number result placeholders from zero", () => {
    expect(CodeGenerator.resultPlaceholders(3)).toEqual(["__result0", "__result1", "__result2"]);
  });

  it("should render the import and setup blocks", () => {
    expect(CodeGenerator.renderImportBlock("example.com/trace")).toBe(
      '\n\n/* BEGIN_ERRGOTRACE */\nimport __errgotrace "example.com/trace"\n/* END_ERRGOTRACE */'
    );
    expect(CodeGenerator.renderSetupBlock()).toBe(
      "\n/* BEGIN_ERRGOTRACE */\nvar _ = __errgotrace.Setup()\n/* END_ERRGOTRACE */\n"
    );
  });

  it("should be deterministic", () => {
    const sig = signature({ orderedResultCount: 4, resultsTypeText: "(a, b, c int, err error)" });
    expect(CodeGenerator.renderFunctionBlock(sig)).toBe(CodeGenerator.renderFunctionBlock(sig));
  });
});
