/**
 * @fileoverview Virtualization Search Service
 *
 * Runs customer searches through the data-virtualization server. Queries are
 * validated locally, mapped onto a published view, then sent through the
 * license gate.
 *
 * @remarks
 * Views:
 * - `customers`: exact match on any column via query parameters; prefix,
 *   suffix and substring are filtered here on the returned rows
 * - `customers_by_category`, `customers_by_status`
 *
 * Each carries a `_search_store` twin that reads the search store only.
 */

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { CustomerView, NOT_AVAILABLE_IN_MODE } from '../customers/interfaces';
import { EncryptionRouter } from '../encryption';
import { QueryKind, ValidatedQuery } from '../encryption/interfaces';
import { InvalidQueryError } from '../shared/errors';
import { isOperatingMode, OperatingMode } from '../search/interfaces';
import { LicenseGateService } from './license-gate.service';
import {
    LicenseUsageStats,
    ViewPlan,
    VirtualizationSearchRequest,
    VirtualizationSearchResult,
} from './interfaces';
import { VirtualizationClient } from './virtualization.client';

const SEARCH_STORE_VIEW_SUFFIX = '_search_store';

/** Row column each searchable field is read from. */
const FIELD_COLUMNS: Record<string, keyof CustomerView> = {
    name: 'full_name',
    email: 'email',
    phone: 'phone',
    category: 'category',
    status: 'status',
};

/** Fields with a dedicated equality view. */
const EQUALITY_VIEWS: Record<string, string> = {
    category: 'customers_by_category',
    status: 'customers_by_status',
};

const ViewRowSchema = z.object({
    customer_id: z.string(),
    full_name: z.string(),
    email: z.string(),
    phone: z.string().default(''),
    address: z.object({
        street: z.string().default(''),
        city: z.string().default(''),
        state: z.string().default(''),
        zip_code: z.string().default(''),
    }).default({}),
    preferences: z.object({
        newsletter: z.boolean().default(false),
        sms: z.boolean().default(false),
    }).default({}),
    tier: z.string(),
    category: z.string(),
    status: z.string(),
    loyalty_points: z.coerce.number().int(),
    last_purchase_date: z.string(),
    lifetime_value: z.coerce.number(),
    created_at: z.string().default(NOT_AVAILABLE_IN_MODE),
    updated_at: z.string().default(NOT_AVAILABLE_IN_MODE),
});

@Injectable()
export class VirtualizationService {
    private readonly logger = new Logger(VirtualizationService.name);

    constructor(
        private readonly router: EncryptionRouter,
        private readonly gate: LicenseGateService,
        private readonly client: VirtualizationClient,
    ) { }

    /**
     * @throws UnknownFieldError | InvalidQueryError before the gate is entered
     * @throws WouldThrottleError when no license slot is available
     * @throws VirtualizationUnavailableError when the server fails
     */
    async search(request: VirtualizationSearchRequest): Promise<VirtualizationSearchResult> {
        if (!isOperatingMode(request.mode)) {
            throw new InvalidQueryError(`Unknown operating mode '${String(request.mode)}'`);
        }
        const query = this.router.validate(request.field, request.queryKind, request.value);
        const plan = this.plan(query, request.mode);
        const startedAt = Date.now();

        const { rows, rowLimitReached } = await this.gate.run(() => this.client.fetchView(plan.view, plan.params));

        const records: CustomerView[] = [];
        let skippedRows = 0;
        for (const row of rows) {
            const parsed = ViewRowSchema.safeParse(row);
            if (!parsed.success) {
                skippedRows++;
                continue;
            }
            const view = this.forMode(parsed.data, request.mode);
            if (!plan.filter || plan.filter(view)) {
                records.push(view);
            }
        }
        if (skippedRows > 0) {
            this.logger.warn({ msg: 'Skipped undecodable view rows', view: plan.view, skippedRows });
        }

        const result: VirtualizationSearchResult = {
            view: plan.view,
            mode: request.mode,
            field: query.spec.field,
            queryKind: query.kind,
            records: request.limit === undefined ? records : records.slice(0, request.limit),
            rowLimitReached,
            skippedRows,
            durationMs: Date.now() - startedAt,
        };

        this.logger.log({
            msg: 'Virtualization search completed',
            view: plan.view,
            mode: request.mode,
            resultCount: result.records.length,
            rowLimitReached,
            durationMs: result.durationMs,
        });
        return result;
    }

    licenseStats(): LicenseUsageStats {
        return this.gate.stats();
    }

    resetLicenseStats(): LicenseUsageStats {
        return this.gate.reset();
    }

    /**
     * Picks the view and the server-side parameters for a validated query.
     *
     * @throws InvalidQueryError for fields no view exposes
     */
    plan(query: ValidatedQuery, mode: OperatingMode): ViewPlan {
        const field = query.spec.field;
        const column = Object.prototype.hasOwnProperty.call(FIELD_COLUMNS, field) ? FIELD_COLUMNS[field] : undefined;
        if (!column) {
            throw new InvalidQueryError(`Field '${field}' is not exposed by any virtualization view`);
        }
        const suffix = mode === OperatingMode.SearchStoreOnly ? SEARCH_STORE_VIEW_SUFFIX : '';

        if (query.kind === 'equality') {
            const dedicated = Object.prototype.hasOwnProperty.call(EQUALITY_VIEWS, field) ? EQUALITY_VIEWS[field] : undefined;
            return { view: `${dedicated ?? 'customers'}${suffix}`, params: { [column]: query.value } };
        }

        const fold = (s: string) => (query.spec.caseSensitive ? s : s.toLowerCase());
        const wanted = fold(query.value);
        const read = (row: CustomerView) => fold(String(row[column]));
        const filters: Record<Exclude<QueryKind, 'equality'>, (row: CustomerView) => boolean> = {
            prefix: (row) => read(row).startsWith(wanted),
            suffix: (row) => read(row).endsWith(wanted),
            substring: (row) => read(row).includes(wanted),
        };
        return { view: `customers${suffix}`, params: {}, filter: filters[query.kind] };
    }

    private forMode(row: CustomerView, mode: OperatingMode): CustomerView {
        if (mode === OperatingMode.Hybrid) {
            return row;
        }
        return { ...row, created_at: NOT_AVAILABLE_IN_MODE, updated_at: NOT_AVAILABLE_IN_MODE };
    }
}
