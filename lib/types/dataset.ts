// Dataset types - the tabular shape shared by generator, filters and aggregations
export type FieldValue = string | number;
export type FieldKind = 'categorical' | 'numeric' | 'date';

export type DataRow = Record<string, FieldValue>;
export type DatasetSchema = Readonly<Record<string, FieldKind>>;

export interface Dataset<T extends DataRow = DataRow> {
  schema: DatasetSchema;
  records: readonly T[];
}

// Group-by output: group fields plus one numeric column per reducer
export type AggregateView = Dataset<DataRow>;

export type Predicate =
  | { kind: 'membership'; field: string; values: readonly FieldValue[] }
  | { kind: 'minimum'; field: string; value: number };

export type ReducerKind = 'sum' | 'mean' | 'count';

export interface ReducerSpec {
  field: string;
  reducer: ReducerKind;
}

export interface MonthlyTrendPoint {
  group: FieldValue;
  month: string; // first day of the month, YYYY-MM-DD
  mean: number;
}

export interface NumericRange {
  min: number;
  max: number;
}
