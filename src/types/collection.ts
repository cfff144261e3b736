/**
 * Collection pipeline types: targets, results, runs and export rows
 */

// ============================================================================
// TARGETS
// ============================================================================

/**
 * One seller to collect, produced by the upstream listing step
 */
export interface CollectionTarget {
  entityId: string;
  /** Display name used in exports */
  name: string;
  /** Seller page URL the fetcher resolves */
  locator: string;
  /** Aggregate value computed upstream (total winning bids, in yen) */
  aggregateValue?: number;
  /** Admission gate for aggregateValue */
  threshold?: number;
}

/**
 * Targets without a value or threshold are admitted
 */
export function isAdmitted(target: CollectionTarget): boolean {
  if (target.aggregateValue === undefined || target.threshold === undefined) {
    return true;
  }
  return target.aggregateValue >= target.threshold;
}

// ============================================================================
// SUB-RECORDS AND CLASSIFICATION
// ============================================================================

export interface SubRecord {
  label: string;
}

export enum Classification {
  POSITIVE = 'POSITIVE',
  NEGATIVE = 'NEGATIVE',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Raw sub-records for one entity, before classification
 */
export interface FetchedEntity {
  target: CollectionTarget;
  subRecords: SubRecord[];
  partial: boolean;
}

export interface CollectionResult {
  entityId: string;
  name: string;
  locator: string;
  subRecords: SubRecord[];
  classification: Classification;
  /** Fewer than maxItems fetched, or at least one classifier call gave no answer */
  partial: boolean;
  /** Sub-records left unexamined after an early POSITIVE */
  skippedCount: number;
  examinedCount: number;
  unknownCount: number;
  /** Zero-based index of the sub-record that triggered POSITIVE */
  positiveIndex?: number;
}

// ============================================================================
// FAILURES AND RUNS
// ============================================================================

export type ErrorKind =
  | 'ConnectionError'
  | 'SessionExpiredError'
  | 'AuthenticationError'
  | 'ProxyAuthenticationError'
  | 'UnexpectedError';

export interface CollectionFailure {
  entityId: string;
  errorKind: ErrorKind;
  message: string;
}

export interface RunSummary {
  positive: number;
  negative: number;
  unknown: number;
  failed: number;
  total: number;
}

export interface CollectionRun {
  results: CollectionResult[];
  failures: CollectionFailure[];
  /** Targets removed by the admission threshold before scheduling */
  rejected: string[];
  startedAt: Date;
  finishedAt: Date;
  summary: RunSummary;
  intermediatePath?: string;
  finalPath?: string;
  /** The soft wall-clock budget was exceeded */
  timedOut: boolean;
  exportErrors: Error[];
}

// ============================================================================
// EXPORT ROWS
// ============================================================================

export const ClassificationLabel = {
  PENDING: '未判定',
  POSITIVE: 'はい',
  NEGATIVE: 'いいえ'
} as const;

export type ClassificationLabelValue = (typeof ClassificationLabel)[keyof typeof ClassificationLabel];

export interface ExportRow {
  entityName: string;
  entityLocator: string;
  label: ClassificationLabelValue;
}

/**
 * Map a classification to its export label; UNKNOWN and not-yet-judged share 未判定
 */
export function toLabel(classification: Classification | undefined): ClassificationLabelValue {
  switch (classification) {
    case Classification.POSITIVE:
      return ClassificationLabel.POSITIVE;
    case Classification.NEGATIVE:
      return ClassificationLabel.NEGATIVE;
    default:
      return ClassificationLabel.PENDING;
  }
}

/**
 * Parse an export label back into a classification
 */
export function fromLabel(label: string): Classification {
  switch (label.trim()) {
    case ClassificationLabel.POSITIVE:
      return Classification.POSITIVE;
    case ClassificationLabel.NEGATIVE:
      return Classification.NEGATIVE;
    case ClassificationLabel.PENDING:
      return Classification.UNKNOWN;
    default:
      throw new RangeError(`Unknown classification label: ${label}`);
  }
}

export function summarize(results: CollectionResult[], failures: CollectionFailure[]): RunSummary {
  const count = (classification: Classification) =>
    results.filter((result) => result.classification === classification).length;

  return {
    positive: count(Classification.POSITIVE),
    negative: count(Classification.NEGATIVE),
    unknown: count(Classification.UNKNOWN),
    failed: failures.length,
    total: results.length + failures.length
  };
}
