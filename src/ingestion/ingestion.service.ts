/**
 * @fileoverview Ingestion Coordinator
 *
 * Writes generated customers into both stores, search store first. A record
 * never stays in the record store without its search-store twin: when the
 * second write fails the first is deleted again.
 *
 * @remarks
 * - One record's failure never aborts its batch; duplicates are not retried.
 * - After every sub-batch both stores are counted over the batch's
 *   identifiers. A mismatch is a warning; `INGEST_ON_MISMATCH=halt` stops
 *   the run after that batch.
 * - The deadline applies per store call, not per batch.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter, Histogram } from 'prom-client';
import { CustomerSource } from '../customers/customer.generator';
import { CustomerRecord, RECORD_STORE, RecordStore, SEARCH_STORE, SearchStore } from '../customers/interfaces';
import { CallOptions, settlementOf, withDeadline } from '../shared/resilience/deadline';
import { DuplicateKeyError, InvalidIngestionRequestError } from '../shared/errors';
import {
    BatchReport,
    ConsistencyWarning,
    CUSTOMER_SOURCE,
    IngestionSummary,
    MismatchPolicy,
    RecordFailureReason,
    RecordResult,
} from './interfaces';

const recordCounter = new Counter({
    name: 'ingestion_records_total',
    help: 'Ingested records by outcome',
    labelNames: ['outcome', 'reason'],
});

const consistencyWarningCounter = new Counter({
    name: 'ingestion_consistency_warnings_total',
    help: 'Sub-batches whose store counts disagreed',
});

const runDuration = new Histogram({
    name: 'ingestion_run_duration_seconds',
    help: 'Ingestion run duration',
    labelNames: ['status'],
    buckets: [0.1, 0.5, 1, 5, 15, 60, 300],
});

interface StoreCounts {
    searchStoreCount: number | null;
    recordStoreCount: number | null;
}

@Injectable()
export class IngestionService {
    private readonly logger = new Logger(IngestionService.name);
    private readonly deadlineMs: number;
    private readonly mismatchPolicy: MismatchPolicy;
    readonly defaultBatchSize: number;

    constructor(
        @Inject(CUSTOMER_SOURCE) private readonly source: CustomerSource,
        @Inject(SEARCH_STORE) private readonly searchStore: SearchStore,
        @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
        configService: ConfigService,
    ) {
        this.deadlineMs = configService.get<number>('STORE_DEADLINE_MS', 5000);
        this.mismatchPolicy = configService.get<MismatchPolicy>('INGEST_ON_MISMATCH', 'continue');
        this.defaultBatchSize = configService.get<number>('INGEST_BATCH_SIZE', 100);
    }

    /**
     * Generates `count` customers and writes them in sub-batches of `batchSize`.
     *
     * @throws InvalidIngestionRequestError when either argument is not a positive integer
     */
    async ingest(batchSize: number, count: number): Promise<IngestionSummary> {
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new InvalidIngestionRequestError(`batchSize must be a positive integer, got ${batchSize}`);
        }
        if (!Number.isInteger(count) || count < 1) {
            throw new InvalidIngestionRequestError(`count must be a positive integer, got ${count}`);
        }

        const startTime = Date.now();
        const timer = runDuration.startTimer();
        const options: CallOptions = { deadlineMs: this.deadlineMs };
        const batches: BatchReport[] = [];
        const warnings: ConsistencyWarning[] = [];
        const generatedIds: string[][] = [];
        const failures: RecordResult[] = [];
        let halted = false;

        this.logger.log({ msg: 'Starting ingestion', count, batchSize, mismatchPolicy: this.mismatchPolicy });

        try {
            for (let startIndex = 0; startIndex < count; startIndex += batchSize) {
                const size = Math.min(batchSize, count - startIndex);
                const records = this.source.generate(size, { startIndex, runSize: count });
                const batchIds = records.map((record) => record.customer_id);
                generatedIds.push(batchIds);

                const results: RecordResult[] = [];
                for (const record of records) {
                    results.push(await this.ingestRecord(record, options));
                }
                failures.push(...results.filter((result) => result.outcome !== 'committed'));

                const report = await this.validateBatch(batches.length, batchIds, results, options);
                batches.push(report);

                this.logger.log({ msg: 'Ingestion batch completed', ...report });

                if (!report.consistent) {
                    const warning = this.toWarning(report);
                    warnings.push(warning);
                    consistencyWarningCounter.inc();
                    this.logger.warn({ msg: 'Consistency warning', ...warning });

                    if (this.mismatchPolicy === 'halt') {
                        halted = true;
                        break;
                    }
                }
            }

            const finalCounts = await this.countAll(generatedIds, options);
            const summary: IngestionSummary = {
                generated: this.sum(batches, 'generated'),
                committed: this.sum(batches, 'committed'),
                rolledBack: this.sum(batches, 'rolledBack'),
                failed: this.sum(batches, 'failed'),
                storesAgree:
                    finalCounts.searchStoreCount !== null &&
                    finalCounts.searchStoreCount === finalCounts.recordStoreCount,
                ...finalCounts,
                halted,
                batches,
                warnings,
                failures,
                durationMs: Date.now() - startTime,
            };

            timer({ status: halted ? 'halted' : 'completed' });
            this.logger.log({
                msg: 'Ingestion completed',
                generated: summary.generated,
                committed: summary.committed,
                rolledBack: summary.rolledBack,
                failed: summary.failed,
                storesAgree: summary.storesAgree,
                halted,
                durationMs: summary.durationMs,
            });
            return summary;
        } catch (error) {
            timer({ status: 'error' });
            this.logger.error({ msg: 'Ingestion failed', error, batchesCompleted: batches.length });
            throw error;
        }
    }

    /* ---------------------------------------------------------------------- */
    /*                              Per record                                 */
    /* ---------------------------------------------------------------------- */

    /**
     * Search store first, then record store. A record never sits in the record
     * store without its search-store twin: on a record-store failure the row is
     * removed (after any timed-out insert has settled) before the twin is.
     */
    private async ingestRecord(record: CustomerRecord, options: CallOptions): Promise<RecordResult> {
        const customerId = record.customer_id;

        try {
            await this.searchStore.insert(record, options);
        } catch (error) {
            const reason = this.reasonFor(error, 'search_store_unavailable');
            this.logger.warn({ msg: 'Search store insert failed', customerId, reason, error });
            if (reason !== 'duplicate_key') {
                await this.discardLateSearchWrite(customerId, error, options);
            }
            return this.tally({ customerId, outcome: 'failed', reason });
        }

        try {
            await this.recordStore.insert(record, options);
        } catch (error) {
            const reason = this.reasonFor(error, 'record_store_unavailable');
            this.logger.warn({ msg: 'Record store insert failed, compensating', customerId, reason, error });

            try {
                if (reason !== 'duplicate_key') {
                    await this.awaitLateWrite(error, options);
                    await this.recordStore.delete(customerId, options);
                }
                await this.searchStore.delete(customerId, options);
            } catch (compensationError) {
                this.logger.error({ msg: 'Compensating delete failed', customerId, error: compensationError });
                return this.tally({ customerId, outcome: 'failed', reason: 'compensation_failed' });
            }
            return this.tally({ customerId, outcome: 'rolled_back', reason });
        }

        return this.tally({ customerId, outcome: 'committed' });
    }

    /** A timed-out search-store insert may still land; remove it once it has. */
    private async discardLateSearchWrite(customerId: string, error: unknown, options: CallOptions): Promise<void> {
        try {
            await this.awaitLateWrite(error, options);
            await this.searchStore.delete(customerId, options);
        } catch (cleanupError) {
            this.logger.warn({ msg: 'Could not clear a timed-out search store insert', customerId, error: cleanupError });
        }
    }

    /**
     * Waits, for at most one more deadline, until a write abandoned by its
     * deadline has finished. Throws if it still has not.
     */
    private async awaitLateWrite(error: unknown, options: CallOptions): Promise<void> {
        const settlement = settlementOf(error);
        if (settlement === undefined) {
            return;
        }
        await withDeadline(
            settlement,
            options.deadlineMs,
            () => new Error(`Timed-out write still pending after a further ${options.deadlineMs}ms`),
        );
    }

    private reasonFor(error: unknown, unavailable: RecordFailureReason): RecordFailureReason {
        return error instanceof DuplicateKeyError ? 'duplicate_key' : unavailable;
    }

    private tally(result: RecordResult): RecordResult {
        recordCounter.inc({ outcome: result.outcome, reason: result.outcome === 'committed' ? '' : result.reason });
        return result;
    }

    /* ---------------------------------------------------------------------- */
    /*                              Consistency                                */
    /* ---------------------------------------------------------------------- */

    private async validateBatch(
        batch: number,
        batchIds: string[],
        results: RecordResult[],
        options: CallOptions,
    ): Promise<BatchReport> {
        const committed = results.filter((r) => r.outcome === 'committed').length;
        const rolledBack = results.filter((r) => r.outcome === 'rolled_back').length;
        const failed = results.filter((r) => r.outcome === 'failed').length;
        const counts = await this.countStores(batchIds, options);

        return {
            batch,
            generated: results.length,
            committed,
            rolledBack,
            failed,
            ...counts,
            consistent: counts.searchStoreCount === committed && counts.recordStoreCount === committed,
        };
    }

    private async countStores(ids: readonly string[], options: CallOptions): Promise<StoreCounts> {
        const [searchStoreCount, recordStoreCount] = await Promise.all([
            this.searchStore.countByIds(ids, options).catch((error: unknown) => this.countFailed('search', error)),
            this.recordStore.countByIds(ids, options).catch((error: unknown) => this.countFailed('record', error)),
        ]);
        return { searchStoreCount, recordStoreCount };
    }

    private countFailed(store: 'search' | 'record', error: unknown): null {
        this.logger.warn({ msg: 'Store count failed', store, error });
        return null;
    }

    /** Fresh recount over every generated identifier, batch by batch. */
    private async countAll(generatedIds: string[][], options: CallOptions): Promise<StoreCounts> {
        let searchStoreCount: number | null = 0;
        let recordStoreCount: number | null = 0;

        for (const ids of generatedIds) {
            const counts = await this.countStores(ids, options);
            searchStoreCount = searchStoreCount === null || counts.searchStoreCount === null
                ? null
                : searchStoreCount + counts.searchStoreCount;
            recordStoreCount = recordStoreCount === null || counts.recordStoreCount === null
                ? null
                : recordStoreCount + counts.recordStoreCount;
        }
        return { searchStoreCount, recordStoreCount };
    }

    private toWarning(report: BatchReport): ConsistencyWarning {
        const describe = (count: number | null) => (count === null ? 'unavailable' : String(count));
        return {
            batch: report.batch,
            committed: report.committed,
            searchStoreCount: report.searchStoreCount,
            recordStoreCount: report.recordStoreCount,
            message:
                `Batch ${report.batch}: ${report.committed} committed, search store holds ` +
                `${describe(report.searchStoreCount)}, record store holds ${describe(report.recordStoreCount)}`,
        };
    }

    private sum(batches: BatchReport[], key: 'generated' | 'committed' | 'rolledBack' | 'failed'): number {
        return batches.reduce((total, batch) => total + batch[key], 0);
    }
}
