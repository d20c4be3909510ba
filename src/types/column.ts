/**
 * Column specification: one display column of the job report.
 *
 * A spec carries a canonical field name, an alignment symbol and a width
 * that is either unset (derived from the data at render time) or fixed.
 * The width moves from unset to fixed exactly once and never changes
 * afterwards.
 */

/**
 * Alignment symbols accepted by the format grammar.
 *   "<" left, "^" center, ">" right
 */
export type Alignment = "<" | "^" | ">";

export const DEFAULT_ALIGNMENT: Alignment = "^";

const ALIGNMENTS: ReadonlySet<string> = new Set(["<", "^", ">"]);

export function isAlignment(value: string): value is Alignment {
  return ALIGNMENTS.has(value);
}

/**
 * Width state of a column. "unset" means the width will be derived from
 * the title and the column's entries on first render.
 */
export type ColumnWidth =
  | { readonly state: "unset" }
  | { readonly state: "fixed"; readonly value: number };

function assertValidWidth(width: number): void {
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`Column width must be a non-negative integer, got ${width}`);
  }
}

export class ColumnSpec {
  private widthState: ColumnWidth;

  constructor(
    readonly name: string,
    readonly alignment: Alignment = DEFAULT_ALIGNMENT,
    width?: number,
  ) {
    if (width === undefined) {
      this.widthState = { state: "unset" };
    } else {
      assertValidWidth(width);
      this.widthState = { state: "fixed", value: width };
    }
  }

  get width(): number | undefined {
    return this.widthState.state === "fixed" ? this.widthState.value : undefined;
  }

  get isWidthFixed(): boolean {
    return this.widthState.state === "fixed";
  }

  /**
   * Fix the width. Throws if the width was already fixed (programmer error).
   */
  fixWidth(width: number): void {
    if (this.widthState.state === "fixed") {
      throw new Error(`Width of column "${this.name}" is already fixed at ${this.widthState.value}`);
    }
    assertValidWidth(width);
    this.widthState = { state: "fixed", value: width };
  }

  /**
   * Derive the width from the title and the given entries if it is still
   * unset. Returns the (possibly pre-existing) fixed width.
   */
  computeWidth(entries: readonly string[]): number {
    if (this.widthState.state === "fixed") {
      return this.widthState.value;
    }
    let width = this.name.length;
    for (const entry of entries) {
      width = Math.max(width, entry.length);
    }
    this.fixWidth(width);
    return width;
  }

  /**
   * Returns a copy carrying a different name, keeping alignment and width state.
   */
  withName(name: string): ColumnSpec {
    return new ColumnSpec(name, this.alignment, this.width);
  }

  toString(): string {
    return `${this.name}%${this.alignment}${this.width ?? ""}`;
  }
}
