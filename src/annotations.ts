import * as t from "@babel/types";

const ANNOTATION_TRANSITION = "turbopack-transition";
const ANNOTATION_CHUNKING_TYPE = "turbopack-chunking-type";
const ATTRIBUTE_MODULE_TYPE = "type";

/** String attributes of a static import, e.g. `with { type: "json" }`. */
export class ImportAnnotations {
  private readonly map: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    // sorted so that equal annotations print and hash the same
    this.map = new Map([...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  static parse(attributes: readonly t.ImportAttribute[] | null | undefined): ImportAnnotations {
    const entries: [string, string][] = [];
    for (const attr of attributes ?? []) {
      const key = t.isIdentifier(attr.key) ? attr.key.name : attr.key.value;
      entries.push([key, attr.value.value]);
    }
    return new ImportAnnotations(entries);
  }

  get(key: string): string | undefined {
    return this.map.get(key);
  }

  transition(): string | undefined {
    return this.get(ANNOTATION_TRANSITION);
  }

  chunkingType(): string | undefined {
    return this.get(ANNOTATION_CHUNKING_TYPE);
  }

  moduleType(): string | undefined {
    return this.get(ATTRIBUTE_MODULE_TYPE);
  }

  get isEmpty(): boolean {
    return this.map.size === 0;
  }

  toString(): string {
    if (this.map.size === 0) return "{}";
    return `{ ${[...this.map].map(([k, v]) => `${k}: ${v}`).join(", ")} }`;
  }
}
