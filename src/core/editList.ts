import type { Edit } from "../types/types";

/**
 * Pending insertions into one file's canonical text.
 *
 * Offsets must arrive in non-decreasing order (the declarations are visited
 * in source order), so applying them is a single copy pass.
 */
export class EditList {
  private readonly edits: Edit[] = [];

  get size(): number {
    return this.edits.length;
  }

  add(offset: number, text: string): void {
    const last = this.edits[this.edits.length - 1];
    if (last && offset < last.offset) {
      throw new Error(`edit at offset ${offset} added after edit at offset ${last.offset}`);
    }
    this.edits.push({ offset, text });
  }

  list(): readonly Edit[] {
    return this.edits;
  }

  apply(source: string): string {
    const parts: string[] = [];
    let pos = 0;
    for (const edit of this.edits) {
      if (edit.offset > source.length) {
        throw new Error(`edit offset ${edit.offset} is past the end of the source`);
      }
      parts.push(source.slice(pos, edit.offset), edit.text);
      pos = edit.offset;
    }
    parts.push(source.slice(pos));
    return parts.join("");
  }
}
