import { v4 as uuidv4 } from "uuid";
import type { HistoryRecord } from "../../../shared/types";
import { HISTORY_LIMIT } from "../config/constants";

/** Bounded, newest-first log of asked questions. Survives reconnects. */
export class QueryHistory {
  private records: HistoryRecord[] = [];

  constructor(
    private readonly limit = HISTORY_LIMIT,
    private readonly clock: () => Date = () => new Date()
  ) {}

  record(query: string, queryType: HistoryRecord["queryType"]): HistoryRecord {
    const entry: HistoryRecord = {
      id: uuidv4(),
      query,
      queryType,
      timestamp: this.clock().toISOString(),
    };
    this.records.unshift(entry);
    if (this.records.length > this.limit) this.records.length = this.limit;
    return entry;
  }

  list(): HistoryRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  get size() {
    return this.records.length;
  }
}
