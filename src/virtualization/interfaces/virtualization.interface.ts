/**
 * @fileoverview Virtualization Adapter Interfaces
 */

import { QueryKind } from '../../encryption/interfaces';
import { CustomerView } from '../../customers/interfaces';
import { OperatingMode } from '../../search/interfaces';

/** Injection token for the HTTP client bound to the virtualization server. */
export const VIRTUALIZATION_HTTP = Symbol('VIRTUALIZATION_HTTP');

export interface ViewRows {
    rows: unknown[];
    /** True when the server returned more rows than VIRTUALIZATION_MAX_ROWS. */
    rowLimitReached: boolean;
}

/** One REST view request, before the gate. */
export interface ViewPlan {
    view: string;
    params: Record<string, string>;
    /** Applied to the returned rows when the view cannot filter server-side. */
    filter?: (row: CustomerView) => boolean;
}

export interface VirtualizationSearchRequest {
    field: string;
    value: string;
    mode: OperatingMode;
    queryKind?: QueryKind;
    /** Caps the decoded rows returned to the caller. */
    limit?: number;
}

export interface VirtualizationSearchResult {
    view: string;
    mode: OperatingMode;
    field: string;
    queryKind: QueryKind;
    records: CustomerView[];
    rowLimitReached: boolean;
    /** Rows the server sent that did not decode as customers. */
    skippedRows: number;
    durationMs: number;
}
