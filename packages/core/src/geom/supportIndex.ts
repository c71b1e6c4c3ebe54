/**
 * Spatial index over blending-function supports
 *
 * A uniform bucket grid over the parameter domain. Each support rectangle is
 * registered in every bucket it overlaps; a query returns the bucket holding
 * the parameter, which is a superset of the supports containing it.
 * Stored in CSR form so a built index is immutable and cheap to share.
 */

export interface SupportRect {
  sMin: number;
  sMax: number;
  tMin: number;
  tMax: number;
}

export class SupportIndex {
  private constructor(
    private readonly bounds: SupportRect,
    private readonly cellsS: number,
    private readonly cellsT: number,
    private readonly offsets: Int32Array,
    private readonly items: Int32Array
  ) {}

  /**
   * Build an index over `rects`; item i of the index refers to rects[i].
   */
  static build(rects: readonly SupportRect[]): SupportIndex {
    const bounds: SupportRect = { sMin: Infinity, sMax: -Infinity, tMin: Infinity, tMax: -Infinity };
    for (const r of rects) {
      bounds.sMin = Math.min(bounds.sMin, r.sMin);
      bounds.sMax = Math.max(bounds.sMax, r.sMax);
      bounds.tMin = Math.min(bounds.tMin, r.tMin);
      bounds.tMax = Math.max(bounds.tMax, r.tMax);
    }
    if (rects.length === 0) {
      return new SupportIndex({ sMin: 0, sMax: 0, tMin: 0, tMax: 0 }, 1, 1, new Int32Array(2), new Int32Array(0));
    }

    const cells = Math.max(1, Math.ceil(Math.sqrt(rects.length)));
    const index = new SupportIndex(bounds, cells, cells, new Int32Array(0), new Int32Array(0));

    // Two passes: count per bucket, then fill.
    const counts = new Int32Array(cells * cells + 1);
    for (const r of rects) {
      index.forEachCell(r, (c) => {
        counts[c + 1]++;
      });
    }
    for (let c = 0; c < cells * cells; c++) {
      counts[c + 1] += counts[c];
    }
    const items = new Int32Array(counts[cells * cells]);
    const cursor = counts.slice(0, cells * cells);
    rects.forEach((r, i) => {
      index.forEachCell(r, (c) => {
        items[cursor[c]++] = i;
      });
    });
    return new SupportIndex(bounds, cells, cells, counts, items);
  }

  /**
   * Items whose support may contain (u, v)
   */
  candidates(u: number, v: number): Int32Array {
    const { sMin, sMax, tMin, tMax } = this.bounds;
    if (u < sMin || u > sMax || v < tMin || v > tMax) return new Int32Array(0);
    const c = this.cellIndex(this.cellS(u), this.cellT(v));
    return this.items.subarray(this.offsets[c], this.offsets[c + 1]);
  }

  private cellS(s: number): number {
    const span = this.bounds.sMax - this.bounds.sMin;
    if (span <= 0) return 0;
    const i = Math.floor(((s - this.bounds.sMin) / span) * this.cellsS);
    return Math.min(this.cellsS - 1, Math.max(0, i));
  }

  private cellT(t: number): number {
    const span = this.bounds.tMax - this.bounds.tMin;
    if (span <= 0) return 0;
    const j = Math.floor(((t - this.bounds.tMin) / span) * this.cellsT);
    return Math.min(this.cellsT - 1, Math.max(0, j));
  }

  private cellIndex(i: number, j: number): number {
    return j * this.cellsS + i;
  }

  private forEachCell(r: SupportRect, fn: (cell: number) => void): void {
    const i0 = this.cellS(r.sMin);
    const i1 = this.cellS(r.sMax);
    const j0 = this.cellT(r.tMin);
    const j1 = this.cellT(r.tMax);
    for (let j = j0; j <= j1; j++) {
      for (let i = i0; i <= i1; i++) {
        fn(this.cellIndex(i, j));
      }
    }
  }
}
