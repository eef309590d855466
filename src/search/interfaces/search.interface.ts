/**
 * @fileoverview Search Orchestrator Interfaces
 *
 * Request and result types for mode-switched customer search.
 */

import { QueryKind } from '../../encryption/interfaces';
import { CustomerView, StoreHealth } from '../../customers/interfaces';

/**
 * Which stores a request may touch. Fixed for the lifetime of one request.
 */
export enum OperatingMode {
    /** Identifiers from the search store, full records from the record store. */
    Hybrid = 'hybrid',
    /** Everything from the search store; record-store-only fields are placeholders. */
    SearchStoreOnly = 'search_store_only',
}

export const OPERATING_MODES: readonly OperatingMode[] = [OperatingMode.Hybrid, OperatingMode.SearchStoreOnly];

export function isOperatingMode(value: string): value is OperatingMode {
    return OPERATING_MODES.some((mode) => mode === value);
}

export interface CustomerSearchRequest {
    field: string;
    value: string;
    mode: OperatingMode;
    /** Defaults to the field's first registered operator. */
    queryKind?: QueryKind;
    /** Maximum hits; defaults to SEARCH_DEFAULT_LIMIT. */
    limit?: number;
}

export type PartialResultReason = 'missing_from_record_store' | 'record_store_unavailable';

/** Qualifies a result that is missing some data; not an error. */
export interface PartialResultWarning {
    reason: PartialResultReason;
    customerIds: string[];
    message: string;
}

export interface SearchHit {
    customer_id: string;
    /** Null when the record store could not supply the record. */
    record: CustomerView | null;
}

/**
 * Per-stage latency in milliseconds. Stages a mode does not run report 0.
 */
export interface SearchMetrics {
    searchMs: number;
    fetchMs: number;
    decryptMs: number;
    totalMs: number;
    resultsCount: number;
}

export interface SearchResult {
    mode: OperatingMode;
    field: string;
    queryKind: QueryKind;
    partial: boolean;
    /** Search-store order; identifiers are unique. */
    records: SearchHit[];
    warnings: PartialResultWarning[];
    metrics: SearchMetrics;
}

export interface CustomerStoresHealth {
    status: 'healthy' | 'degraded';
    searchStore: StoreHealth;
    recordStore: StoreHealth;
}
