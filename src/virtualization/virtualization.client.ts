/**
 * @fileoverview Virtualization REST Client
 *
 * Reads published views from the data-virtualization server. Views answer
 * either `{ elements: [...] }` or a bare array; at most
 * VIRTUALIZATION_MAX_ROWS rows are kept.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { Histogram } from 'prom-client';
import { z } from 'zod';
import { VirtualizationUnavailableError } from '../shared/errors';
import { VIRTUALIZATION_HTTP, ViewRows } from './interfaces';

const viewDuration = new Histogram({
    name: 'virtualization_view_request_duration_seconds',
    help: 'Virtualization view request duration',
    labelNames: ['view', 'status'],
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
});

const ViewResponseSchema = z.union([
    z.object({ elements: z.array(z.unknown()) }).passthrough(),
    z.array(z.unknown()),
]);

@Injectable()
export class VirtualizationClient {
    private readonly logger = new Logger(VirtualizationClient.name);
    private readonly maxRows: number;

    constructor(
        @Inject(VIRTUALIZATION_HTTP) private readonly http: AxiosInstance,
        configService: ConfigService,
    ) {
        this.maxRows = configService.get<number>('VIRTUALIZATION_MAX_ROWS', 10000);
    }

    /**
     * GETs one view.
     *
     * @throws VirtualizationUnavailableError on timeout, HTTP error, unreachable
     *   server or an unrecognised body
     */
    async fetchView(view: string, params: Record<string, string>): Promise<ViewRows> {
        const timer = viewDuration.startTimer({ view });

        try {
            const response = await this.http.get<unknown>(`/${encodeURIComponent(view)}`, { params });
            const parsed = ViewResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new VirtualizationUnavailableError(`View ${view} returned an unrecognised body`);
            }

            const all = Array.isArray(parsed.data) ? parsed.data : parsed.data.elements;
            const rowLimitReached = all.length > this.maxRows;
            if (rowLimitReached) {
                this.logger.warn({ msg: 'View row limit reached', view, returned: all.length, maxRows: this.maxRows });
            }

            timer({ status: 'success' });
            return { rows: all.slice(0, this.maxRows), rowLimitReached };
        } catch (error) {
            timer({ status: 'error' });
            const mapped = this.toUnavailable(view, error);
            this.logger.error({ msg: 'Virtualization view request failed', view, error: mapped.message });
            throw mapped;
        }
    }

    private toUnavailable(view: string, error: unknown): VirtualizationUnavailableError {
        if (error instanceof VirtualizationUnavailableError) {
            return error;
        }
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new VirtualizationUnavailableError(`View ${view} timed out`, { cause: error });
            }
            if (error.response) {
                const status = error.response.status;
                const detail = status === 404 ? 'not found (404); is the view published?' : `HTTP ${status}`;
                return new VirtualizationUnavailableError(`View ${view} ${detail}`, { cause: error });
            }
        }
        return new VirtualizationUnavailableError(`Virtualization server unreachable for view ${view}`, { cause: error });
    }
}
