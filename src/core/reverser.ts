import { BEGIN_REGEX, END_REGEX } from "../constants/markers";

type StripState = "NORMAL" | "IN_BLOCK" | "AFTER_BLOCK";

/**
 * Remove every marker block from instrumented source.
 *
 * Works line by line without parsing: the injected blocks are not valid Go
 * on their own. One blank line right after a block is dropped as well,
 * since canonicalization leaves one there after each injection.
 */
export function stripInstrumentation(source: string): string {
  const out: string[] = [];
  let state: StripState = "NORMAL";

  for (const line of source.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (state === "AFTER_BLOCK") {
      state = "NORMAL";
      if (trimmed === "") continue;
    }

    if (state === "IN_BLOCK") {
      if (END_REGEX.test(trimmed)) state = "AFTER_BLOCK";
      continue;
    }

    if (BEGIN_REGEX.test(trimmed)) {
      state = "IN_BLOCK";
      continue;
    }

    out.push(line);
  }

  const text = out.join("\n").replace(/\n+$/, "");
  return text === "" ? "" : text + "\n";
}

