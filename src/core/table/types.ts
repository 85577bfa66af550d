/** A single cell value. `null` marks a missing value. */
export type Cell = number | string | boolean | null;

/** Semantic column kind, resolved once when the table is built. */
export type ColumnKind = 'numeric' | 'categorical' | 'other';

/** Column whose non-missing values are all finite numbers. */
export interface NumericColumn {
  readonly kind: 'numeric';
  readonly name: string;
  readonly values: readonly (number | null)[];
}

/** Column holding text values; mixed-type columns keep their raw cells. */
export interface CategoricalColumn {
  readonly kind: 'categorical';
  readonly name: string;
  readonly values: readonly Cell[];
}

/** Boolean or entirely-missing column. */
export interface OtherColumn {
  readonly kind: 'other';
  readonly name: string;
  readonly values: readonly (boolean | null)[];
}

export type Column = NumericColumn | CategoricalColumn | OtherColumn;

/** An ordered set of named, equally long columns. */
export interface Table {
  readonly columns: readonly Column[];
  readonly rowCount: number;
}
