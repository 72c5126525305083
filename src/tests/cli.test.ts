import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdir, mkdtemp, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildProgram, run } from "../cli/index";

const GOOD = "package main\n\nfunc F() (int, error) {\n\treturn 1, nil\n}\n";

const cli = (...args: string[]) => run(["node", "errgotrace", ...args]);

describe("cli", () => {
  let dir: string;
  let stdout: MockInstance<typeof process.stdout.write>;
  let stderr: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "errgotrace-cli-"));
    stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    stdout.mockRestore();
    stderr.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  it("should declare every option", () => {
    const flags = buildProgram().options.map((o) => o.long);
    expect(flags).toEqual([
      "--version",
      "--write",
      "--reverse",
      "--exported",
      "--filter",
      "--exclude",
      "--import-path",
      "--verbose",
    ]);
  });

  it("should print usage and fail without paths", async () => {
    expect(await cli()).toBe(1);
    expect(stdout).toHaveBeenCalledWith(expect.stringContaining("Usage: errgotrace"));
  });

  it("should reject an invalid filter before touching any file", async () => {
    const file = join(dir, "main.go");
    await writeFile(file, GOOD);

    expect(await cli("-w", "--filter", "(", file)).toBe(1);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining("error in filter regex ("));
    expect(await readFile(file, "utf8")).toBe(GOOD);
  });

  it("should reject an invalid import path", async () => {
    expect(await cli("--import-path", "a b", join(dir, "main.go"))).toBe(1);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('invalid import path "a b"'));
  });

  it("should instrument and restore a directory in place", async () => {
    const file = join(dir, "main.go");
    const vendored = join(dir, "vendor", "dep.go");
    await writeFile(file, GOOD);
    await mkdir(join(dir, "vendor"));
    await writeFile(vendored, GOOD);

    expect(await cli("-w", dir)).toBe(0);
    expect(await readFile(file, "utf8")).toContain("__result0, __result1 := __F()");
    expect(await readFile(vendored, "utf8")).toBe(GOOD);

    expect(await cli("-w", "-r", dir)).toBe(0);
    expect(await readFile(file, "utf8")).toBe(GOOD);
  });

  it("should print to stdout without write mode", async () => {
    const file = join(dir, "main.go");
    await writeFile(file, GOOD);

    expect(await cli("--exported", file)).toBe(0);
    expect(stdout).toHaveBeenCalledWith(expect.stringContaining('InspectReturnValues("main.F"'));
    expect(await readFile(file, "utf8")).toBe(GOOD);
  });

  it("should fail when any file fails", async () => {
    expect(await cli(join(dir, "missing.go"))).toBe(1);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining("missing.go: failed to open ("));
  });

  it("should process the other files when a directory entry is broken", async () => {
    const good = join(dir, "a.go");
    const broken = join(dir, "b.go");
    await writeFile(good, GOOD);
    await symlink(join(dir, "gone.go"), broken);

    expect(await cli("-w", dir)).toBe(1);
    expect(await readFile(good, "utf8")).toContain("__result0, __result1 := __F()");
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining(`${broken}: failed to open (ENOENT`));
  });

  it("should succeed when there is nothing to do", async () => {
    expect(await cli(dir)).toBe(0);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining("No go files found."));
  });

  it("should summarize in verbose mode", async () => {
    await writeFile(join(dir, "main.go"), GOOD);

    expect(await cli("-v", dir)).toBe(0);
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining("Summary"));
  });
});
