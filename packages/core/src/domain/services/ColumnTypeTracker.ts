import { ColumnType, resolveColumnType } from '../model/ColumnType.js';
import type { ResolvedColumnType } from '../model/ColumnType.js';
import { observeValue } from './TypeLattice.js';

/** Called whenever a column moves up the type order. */
export type PromotionListener = (columnIndex: number, from: ColumnType, to: ColumnType) => void;

/**
 * Per-column type state for one scan.
 *
 * Every column starts at `UNKNOWN` and only moves towards `TEXT`. Once
 * `finalize()` has been called the tracker is frozen and rejects further rows.
 */
export class ColumnTypeTracker {
  private readonly types: ColumnType[];
  private readonly onPromote: PromotionListener | null;
  private resolved: readonly ResolvedColumnType[] | null = null;

  constructor(columnCount: number, onPromote?: PromotionListener) {
    this.types = new Array<ColumnType>(columnCount).fill(ColumnType.UNKNOWN);
    this.onPromote = onPromote ?? null;
  }

  get columnCount(): number {
    return this.types.length;
  }

  /** Feed one cell. Indexes outside the header are ignored. */
  observe(columnIndex: number, value: string): void {
    this.assertOpen();
    const current = this.types[columnIndex];
    if (current === undefined) return;

    const next = observeValue(current, value);
    if (next !== current) {
      this.types[columnIndex] = next;
      this.onPromote?.(columnIndex, current, next);
    }
  }

  /**
   * Feed a whole row. Missing trailing cells count as empty and leave their
   * columns untouched; cells past the header are dropped.
   */
  observeRow(fields: readonly string[]): void {
    const count = Math.min(fields.length, this.types.length);
    for (let i = 0; i < count; i++) {
      this.observe(i, fields[i] ?? '');
    }
  }

  /** Current (unresolved) type of every column. */
  snapshot(): readonly ColumnType[] {
    return [...this.types];
  }

  /** Resolve `UNKNOWN` columns to `TEXT` and freeze the result. Idempotent. */
  finalize(): readonly ResolvedColumnType[] {
    if (!this.resolved) {
      this.resolved = Object.freeze(this.types.map(resolveColumnType));
    }
    return this.resolved;
  }

  private assertOpen(): void {
    if (this.resolved) {
      throw new Error('ColumnTypeTracker: cannot observe values after finalize()');
    }
  }
}
