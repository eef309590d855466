/**
 * @fileoverview Ingestion Coordinator Interfaces
 *
 * Per-record outcomes are values, not exceptions: partial failure during a
 * bulk write is expected and is tallied into the summary.
 */

/** Injection token for the {@link CustomerSource} feeding ingestion runs. */
export const CUSTOMER_SOURCE = Symbol('CUSTOMER_SOURCE');

export type RecordOutcome = 'committed' | 'rolled_back' | 'failed';

export type RecordFailureReason =
    | 'duplicate_key'
    | 'search_store_unavailable'
    | 'record_store_unavailable'
    | 'compensation_failed';

export type RecordResult =
    | { customerId: string; outcome: 'committed' }
    | { customerId: string; outcome: 'rolled_back' | 'failed'; reason: RecordFailureReason };

/** What to do after a sub-batch whose counts disagree. */
export type MismatchPolicy = 'continue' | 'halt';

export const MISMATCH_POLICIES: readonly MismatchPolicy[] = ['continue', 'halt'];

export interface ConsistencyWarning {
    batch: number;
    committed: number;
    /** Null when the store could not be counted. */
    searchStoreCount: number | null;
    recordStoreCount: number | null;
    message: string;
}

export interface BatchReport {
    batch: number;
    generated: number;
    committed: number;
    rolledBack: number;
    failed: number;
    searchStoreCount: number | null;
    recordStoreCount: number | null;
    consistent: boolean;
}

export interface IngestionSummary {
    generated: number;
    committed: number;
    rolledBack: number;
    failed: number;
    /** From fresh counts in each store over every generated identifier. */
    storesAgree: boolean;
    searchStoreCount: number | null;
    recordStoreCount: number | null;
    /** True when a mismatching batch stopped the run under the `halt` policy. */
    halted: boolean;
    batches: BatchReport[];
    warnings: ConsistencyWarning[];
    /** Every record that did not commit, with its reason. */
    failures: RecordResult[];
    durationMs: number;
}
