import { emptyCounts, totalOf } from '../core/status';
import type { ResultRecord, StatusCounts, TestGroupRef, TestStatus } from '../core/types';

/** Dominant visual status of a group. */
export type GroupClassification = TestStatus;

/** Row identifier prefix: p = pass, f = fail or error, s = skip. */
export type RowPrefix = 'p' | 'f' | 's';

export interface ResultRow {
  /** `<prefix>t<group>.<index>`, e.g. `ft2.3`. */
  rowId: string;
  /** 1-based position inside the group. */
  index: number;
  record: ResultRecord;
}

export interface GroupSummary {
  /** `c<n>`, 1-based in first-occurrence order. */
  id: string;
  /** 1-based position of the group. */
  index: number;
  group: TestGroupRef;
  /** `name: description`, or just the name. */
  label: string;
  rows: ResultRow[];
  counts: StatusCounts;
  total: number;
  classification: GroupClassification;
}

const ROW_PREFIXES: Record<TestStatus, RowPrefix> = {
  pass: 'p',
  fail: 'f',
  error: 'f',
  skip: 's',
};

/** Checked in order; the first status with a non-zero count wins. */
const CLASSIFICATION_PRIORITY: readonly Exclude<TestStatus, 'pass'>[] = ['error', 'fail', 'skip'];

/**
 * Strict priority, not a vote: a single error among any number of passes
 * classifies the group as an error.
 */
export function classifyGroup(counts: Readonly<StatusCounts>): GroupClassification {
  return CLASSIFICATION_PRIORITY.find((status) => counts[status] > 0) ?? 'pass';
}

export const rowPrefix = (status: TestStatus): RowPrefix => ROW_PREFIXES[status];

export const groupId = (groupIndex: number): string => `c${groupIndex}`;

export const rowId = (status: TestStatus, groupIndex: number, recordIndex: number): string =>
  `${rowPrefix(status)}t${groupIndex}.${recordIndex}`;

export const labelFor = (name: string, description: string | undefined): string => {
  const firstLine = description?.split('\n')[0]?.trim();
  return firstLine ? `${name}: ${firstLine}` : name;
};

/**
 * Groups records by owning group in one pass. Group order is the order in
 * which each group first appears; records keep emission order inside a group.
 */
export function groupResults(records: readonly ResultRecord[]): GroupSummary[] {
  const byGroup = new Map<string, { group: TestGroupRef; records: ResultRecord[] }>();
  const order: string[] = [];

  for (const record of records) {
    const key = record.test.group.id;
    let bucket = byGroup.get(key);
    if (!bucket) {
      bucket = { group: record.test.group, records: [] };
      byGroup.set(key, bucket);
      order.push(key);
    }
    bucket.records.push(record);
  }

  return order.map((key, position) => {
    const bucket = byGroup.get(key);
    if (!bucket) {
      throw new Error(`Group ${key} missing from index`);
    }

    const index = position + 1;
    const counts = emptyCounts();
    const rows = bucket.records.map((record, recordPosition) => {
      counts[record.status] += 1;
      return {
        rowId: rowId(record.status, index, recordPosition + 1),
        index: recordPosition + 1,
        record,
      };
    });

    return {
      id: groupId(index),
      index,
      group: bucket.group,
      label: labelFor(bucket.group.name, bucket.group.description),
      rows,
      counts,
      total: totalOf(counts),
      classification: classifyGroup(counts),
    };
  });
}
