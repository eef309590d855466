/**
 * @fileoverview Customer Search Orchestrator
 *
 * Runs a validated query against one or both stores depending on the
 * operating mode and assembles a uniformly shaped result.
 *
 * @remarks
 * - Hybrid: search store yields identifiers, record store yields the
 *   authoritative records. A record-store outage degrades to identifiers
 *   only; a search-store outage fails the request.
 * - SearchStoreOnly: search store yields decrypted projections; fields only
 *   the record store tracks are filled with {@link NOT_AVAILABLE_IN_MODE}.
 *
 * Results keep the search store's ordering.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter, Histogram } from 'prom-client';
import {
    CustomerRecord,
    CustomerView,
    FullProjection,
    NOT_AVAILABLE_IN_MODE,
    RECORD_STORE,
    RecordStore,
    SEARCH_STORE,
    SearchStore,
} from '../customers/interfaces';
import { EncryptionRouter } from '../encryption';
import { ValidatedQuery } from '../encryption/interfaces';
import { InvalidQueryError, RecordStoreUnavailableError, UnknownFieldError } from '../shared/errors';
import {
    CustomerSearchRequest,
    CustomerStoresHealth,
    OPERATING_MODES,
    OperatingMode,
    PartialResultWarning,
    SearchHit,
    SearchMetrics,
    SearchResult,
} from './interfaces';

/* -------------------------------------------------------------------------- */
/*                              Prometheus Metrics                             */
/* -------------------------------------------------------------------------- */

const searchCounter = new Counter({
    name: 'customer_search_queries_total',
    help: 'Total number of customer search requests',
    labelNames: ['mode', 'status'],
});

const searchDuration = new Histogram({
    name: 'customer_search_duration_seconds',
    help: 'Customer search request duration',
    labelNames: ['mode'],
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
});

type StageTimings = Omit<SearchMetrics, 'totalMs' | 'resultsCount'>;

/* -------------------------------------------------------------------------- */
/*                              Service Implementation                         */
/* -------------------------------------------------------------------------- */

@Injectable()
export class CustomerSearchService {
    private readonly logger = new Logger(CustomerSearchService.name);
    private readonly deadlineMs: number;
    private readonly defaultLimit: number;
    private readonly maxLimit: number;

    constructor(
        private readonly router: EncryptionRouter,
        @Inject(SEARCH_STORE) private readonly searchStore: SearchStore,
        @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
        configService: ConfigService,
    ) {
        this.deadlineMs = configService.get<number>('STORE_DEADLINE_MS', 5000);
        this.defaultLimit = configService.get<number>('SEARCH_DEFAULT_LIMIT', 100);
        this.maxLimit = configService.get<number>('SEARCH_MAX_LIMIT', 10000);
    }

    /**
     * Searches customers by one encrypted field.
     *
     * @throws UnknownFieldError | InvalidQueryError before any store is contacted
     * @throws SearchUnavailableError when the search store fails
     */
    async search(request: CustomerSearchRequest): Promise<SearchResult> {
        const timer = searchDuration.startTimer({ mode: request.mode });
        const startedAt = Date.now();

        try {
            if (!OPERATING_MODES.includes(request.mode)) {
                throw new InvalidQueryError(`Unknown operating mode '${String(request.mode)}'`);
            }
            const query = this.router.validate(request.field, request.queryKind, request.value);
            const limit = this.resolveLimit(request.limit);

            const result = await this.dispatch(request.mode, query, limit, startedAt);

            searchCounter.inc({ mode: request.mode, status: result.partial ? 'partial' : 'success' });
            this.logger.log({
                msg: 'Customer search completed',
                mode: request.mode,
                field: request.field,
                queryKind: query.kind,
                resultCount: result.records.length,
                partial: result.partial,
                totalMs: result.metrics.totalMs,
            });
            return result;
        } catch (error) {
            if (this.isCallerError(error)) {
                searchCounter.inc({ mode: request.mode, status: 'rejected' });
                this.logger.warn({ msg: 'Customer search rejected', mode: request.mode, field: request.field, error });
            } else {
                searchCounter.inc({ mode: request.mode, status: 'error' });
                this.logger.error({ msg: 'Customer search failed', mode: request.mode, field: request.field, error });
            }
            throw error;
        } finally {
            timer();
        }
    }

    /**
     * Reads one customer from the record store.
     *
     * @returns The full projection, or null when the record store has none
     */
    async findById(customerId: string): Promise<FullProjection | null> {
        const records = await this.recordStore.fetchMany([customerId], { deadlineMs: this.deadlineMs });
        return records.get(customerId) ?? null;
    }

    async health(): Promise<CustomerStoresHealth> {
        const options = { deadlineMs: this.deadlineMs };
        const [searchStore, recordStore] = await Promise.all([
            this.searchStore.healthCheck(options),
            this.recordStore.healthCheck(options),
        ]);
        return {
            status: searchStore.healthy && recordStore.healthy ? 'healthy' : 'degraded',
            searchStore,
            recordStore,
        };
    }

    /* ---------------------------------------------------------------------- */
    /*                              Mode handlers                              */
    /* ---------------------------------------------------------------------- */

    private dispatch(
        mode: OperatingMode,
        query: ValidatedQuery,
        limit: number,
        startedAt: number,
    ): Promise<SearchResult> {
        switch (mode) {
            case OperatingMode.Hybrid:
                return this.searchHybrid(query, limit, startedAt);
            case OperatingMode.SearchStoreOnly:
                return this.searchStoreOnly(query, limit, startedAt);
        }
    }

    private async searchHybrid(query: ValidatedQuery, limit: number, startedAt: number): Promise<SearchResult> {
        const searchStart = Date.now();
        const ids = await this.searchStore.findIdentifiers(query, { limit, deadlineMs: this.deadlineMs });
        const searchMs = Date.now() - searchStart;

        if (ids.length === 0) {
            return this.assemble(OperatingMode.Hybrid, query, [], [], { searchMs, fetchMs: 0, decryptMs: 0 }, startedAt);
        }

        const fetchStart = Date.now();
        let projections: Map<string, FullProjection>;
        try {
            projections = await this.recordStore.fetchMany(ids, { deadlineMs: this.deadlineMs });
        } catch (error) {
            if (!(error instanceof RecordStoreUnavailableError)) {
                throw error;
            }
            this.logger.warn({ msg: 'Record store unavailable, returning identifiers only', count: ids.length, error });
            const warning: PartialResultWarning = {
                reason: 'record_store_unavailable',
                customerIds: ids,
                message: 'Record store unavailable; records could not be fetched',
            };
            const hits = ids.map((id) => ({ customer_id: id, record: null }));
            return this.assemble(
                OperatingMode.Hybrid,
                query,
                hits,
                [warning],
                { searchMs, fetchMs: Date.now() - fetchStart, decryptMs: 0 },
                startedAt,
            );
        }
        const fetchMs = Date.now() - fetchStart;

        const hits: SearchHit[] = ids.map((id) => ({ customer_id: id, record: projections.get(id) ?? null }));
        const missing = ids.filter((id) => !projections.has(id));
        const warnings: PartialResultWarning[] = [];
        if (missing.length > 0) {
            this.logger.warn({ msg: 'Search store returned identifiers missing from record store', missing });
            warnings.push({
                reason: 'missing_from_record_store',
                customerIds: missing,
                message: `${missing.length} identifier(s) returned by the search store are absent from the record store`,
            });
        }

        return this.assemble(OperatingMode.Hybrid, query, hits, warnings, { searchMs, fetchMs, decryptMs: 0 }, startedAt);
    }

    private async searchStoreOnly(query: ValidatedQuery, limit: number, startedAt: number): Promise<SearchResult> {
        const searchStart = Date.now();
        const projections = await this.searchStore.findProjections(query, { limit, deadlineMs: this.deadlineMs });
        const searchMs = Date.now() - searchStart;

        const decryptStart = Date.now();
        const hits = projections.map((projection) => ({
            customer_id: projection.customer_id,
            record: this.withPlaceholders(projection),
        }));
        const decryptMs = Date.now() - decryptStart;

        return this.assemble(
            OperatingMode.SearchStoreOnly,
            query,
            hits,
            [],
            { searchMs, fetchMs: 0, decryptMs },
            startedAt,
        );
    }

    /* ---------------------------------------------------------------------- */
    /*                              Helpers                                    */
    /* ---------------------------------------------------------------------- */

    private withPlaceholders(projection: CustomerRecord): CustomerView {
        return {
            ...projection,
            created_at: NOT_AVAILABLE_IN_MODE,
            updated_at: NOT_AVAILABLE_IN_MODE,
        };
    }

    private assemble(
        mode: OperatingMode,
        query: ValidatedQuery,
        records: SearchHit[],
        warnings: PartialResultWarning[],
        timings: StageTimings,
        startedAt: number,
    ): SearchResult {
        return {
            mode,
            field: query.spec.field,
            queryKind: query.kind,
            partial: warnings.length > 0,
            records,
            warnings,
            metrics: {
                ...timings,
                totalMs: Date.now() - startedAt,
                resultsCount: records.length,
            },
        };
    }

    private resolveLimit(limit: number | undefined): number {
        const resolved = limit ?? this.defaultLimit;
        if (!Number.isInteger(resolved) || resolved < 1 || resolved > this.maxLimit) {
            throw new InvalidQueryError(`limit must be an integer between 1 and ${this.maxLimit}`);
        }
        return resolved;
    }

    private isCallerError(error: unknown): boolean {
        return error instanceof UnknownFieldError || error instanceof InvalidQueryError;
    }
}
