import type { DataSource, SourceQuery, SourceResponse } from "../../src/sources/source.types";

export type FakeReply<TRecord> = SourceResponse<TRecord> | Error | ((query: SourceQuery) => SourceResponse<TRecord>);

/** Replays queued replies in order; the last reply repeats once the queue runs dry. */
export class FakeSource<TRecord> implements DataSource<TRecord> {
  readonly key = "fake";
  readonly queries: SourceQuery[] = [];
  private readonly replies: FakeReply<TRecord>[] = [];

  constructor(...replies: FakeReply<TRecord>[]) {
    this.replies.push(...replies);
  }

  enqueue(...replies: FakeReply<TRecord>[]): void {
    this.replies.push(...replies);
  }

  async get(query: SourceQuery): Promise<SourceResponse<TRecord>> {
    this.queries.push(query);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error("FakeSource has no reply queued");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(query) : reply;
  }
}

export function ok<TRecord>(records: TRecord[]): SourceResponse<TRecord> {
  return {ok: true, status: 200, records};
}

export function status<TRecord>(code: number): SourceResponse<TRecord> {
  return {ok: false, status: code, records: []};
}
