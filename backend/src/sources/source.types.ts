export interface SourceQuery {
  settlementDate: string;
  /** Omit to request every period of the date. */
  settlementPeriods?: number[];
  filters?: Record<string, string>;
}

export interface SourceResponse<TRecord> {
  ok: boolean;
  status: number;
  records: TRecord[];
}

/**
 * One upstream dataset. `get` throws on transport failure and reports any
 * non-success HTTP status through `ok`/`status`.
 */
export interface DataSource<TRecord> {
  readonly key: string;
  get(query: SourceQuery, signal?: AbortSignal): Promise<SourceResponse<TRecord>>;
}
