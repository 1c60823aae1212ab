// ---------------------------------------------------------------------------
// LooseVersion: permissive dotted version ordering
// ---------------------------------------------------------------------------

/** A parsed version component: digit runs become integers of any length, everything else stays text. */
export type VersionComponent = bigint | string;

const COMPONENT_PATTERN = /(\d+|[a-z]+|\.)/;

function parseComponents(raw: string): readonly VersionComponent[] {
  return raw
    .split(COMPONENT_PATTERN)
    .filter((piece) => piece !== "" && piece !== ".")
    .map((piece) => (/^\d+$/.test(piece) ? BigInt(piece) : piece));
}

function compareComponent(a: VersionComponent, b: VersionComponent): -1 | 0 | 1 {
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  // Numbers sort before text at the same position
  if (typeof a === "bigint") return -1;
  if (typeof b === "bigint") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Version value with a total order over arbitrary version strings.
 *
 * Components compare left to right: numbers numerically, text by code
 * unit. A version that is a strict prefix of another sorts first, so
 * `1.2 < 1.2.0 < 1.10 < 2.0`.
 */
export class LooseVersion {
  readonly raw: string;
  readonly components: readonly VersionComponent[];

  constructor(raw: string | number) {
    this.raw = String(raw);
    this.components = parseComponents(this.raw);
  }

  compare(other: LooseVersion | string | number): -1 | 0 | 1 {
    const that = other instanceof LooseVersion ? other : new LooseVersion(other);
    const length = Math.min(this.components.length, that.components.length);

    for (let i = 0; i < length; i++) {
      const a = this.components[i];
      const b = that.components[i];
      if (a === undefined || b === undefined) break;
      const result = compareComponent(a, b);
      if (result !== 0) return result;
    }

    const diff = this.components.length - that.components.length;
    return diff < 0 ? -1 : diff > 0 ? 1 : 0;
  }

  equals(other: LooseVersion | string | number): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    return this.raw;
  }

  /** Comparator over raw version strings, for `Array.prototype.sort`. */
  static compare(a: string | number, b: string | number): -1 | 0 | 1 {
    return new LooseVersion(a).compare(b);
  }
}
