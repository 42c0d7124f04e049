import type { ObservationRecord } from "../../packages/shared/src/pipeline-types.js";
import { normalizeTimestamp } from "../utils/calendar.js";
import { orderColumns, unionColumns } from "../utils/column-order.js";
import type { ObservationFragment } from "./response-reshaper.js";

const recordKey = (region: string, timestamp: string): string => `${region}\u0000${timestamp}`;

// Code-point order, matching how the artifact has always been sorted.
const compareText = (left: string, right: string): number => {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

const compareRecords = (left: ObservationRecord, right: ObservationRecord): number =>
  compareText(left.region, right.region) || compareText(left.timestamp, right.timestamp);

export interface MergeStats {
  received: number;
  inserted: number;
  replaced: number;
  dropped: number;
}

/**
 * In-memory consolidated dataset: unique on (region, timestamp), sorted by
 * region then timestamp, with a per-region latest-timestamp index kept in
 * step with every merge.
 */
export class ConsolidatedDataset {
  private metricColumns: string[];

  private records: ObservationRecord[];

  private readonly latestByRegion = new Map<string, string>();

  private constructor(metricColumns: string[], records: ObservationRecord[]) {
    this.metricColumns = metricColumns;
    this.records = records;

    for (const record of records) {
      this.trackLatest(record);
    }
  }

  static empty(): ConsolidatedDataset {
    return new ConsolidatedDataset([], []);
  }

  /** Builds a dataset from persisted rows, applying the same cleanup as a merge. */
  static fromRecords(
    metricColumns: readonly string[],
    records: readonly ObservationRecord[]
  ): ConsolidatedDataset {
    const dataset = ConsolidatedDataset.empty();
    dataset.merge([{ metricColumns: [...metricColumns], records: [...records] }]);
    return dataset;
  }

  get columns(): string[] {
    return orderColumns(this.metricColumns);
  }

  get rowCount(): number {
    return this.records.length;
  }

  get rows(): readonly ObservationRecord[] {
    return this.records;
  }

  get regions(): string[] {
    return [...this.latestByRegion.keys()];
  }

  latestTimestamp(region: string): string | null {
    return this.latestByRegion.get(region) ?? null;
  }

  rowsForRegion(region: string): ObservationRecord[] {
    return this.records.filter((record) => record.region === region);
  }

  /**
   * Folds fragments into the dataset. Later rows win on a duplicate key; rows
   * whose timestamp does not parse are dropped.
   */
  merge(fragments: readonly ObservationFragment[]): MergeStats {
    const stats: MergeStats = { received: 0, inserted: 0, replaced: 0, dropped: 0 };
    if (!fragments.length) {
      return stats;
    }

    const byKey = new Map<string, ObservationRecord>();
    for (const record of this.records) {
      byKey.set(recordKey(record.region, record.timestamp), record);
    }

    const columns = [...this.metricColumns];

    for (const fragment of fragments) {
      unionColumns(columns, fragment.metricColumns);

      for (const record of fragment.records) {
        stats.received += 1;

        const timestamp = normalizeTimestamp(record.timestamp);
        if (!timestamp || !record.region) {
          stats.dropped += 1;
          continue;
        }

        const normalized: ObservationRecord = { ...record, timestamp };
        const key = recordKey(normalized.region, timestamp);

        if (byKey.has(key)) {
          stats.replaced += 1;
        } else {
          stats.inserted += 1;
        }

        byKey.set(key, normalized);
        this.trackLatest(normalized);
      }
    }

    this.metricColumns = orderColumns(columns).slice(1, -1);
    this.records = [...byKey.values()].sort(compareRecords);

    return stats;
  }

  private trackLatest(record: ObservationRecord): void {
    const current = this.latestByRegion.get(record.region);
    if (current === undefined || record.timestamp > current) {
      this.latestByRegion.set(record.region, record.timestamp);
    }
  }
}
