/**
 * @fileoverview MongoDB Search Store
 *
 * SearchStore adapter over the Queryable Encryption collection. The driver
 * encrypts query values and decrypts results; this adapter only shapes
 * filters and documents and maps driver failures.
 *
 * @remarks
 * Query translation:
 * - equality  → `{ path: value }`
 * - prefix    → `$expr.$encStrStartsWith`
 * - suffix    → `$expr.$encStrEndsWith`
 * - substring → `$expr.$encStrContains`
 */

import { Injectable, Logger } from '@nestjs/common';
import { Collection, Document, MongoServerError } from 'mongodb';
import { Counter } from 'prom-client';
import { ValidatedQuery } from '../../encryption/interfaces';
import { CoreError, DuplicateKeyError, SearchUnavailableError } from '../../shared/errors';
import { MongoDbProvider } from '../../shared/mongodb';
import { CallOptions, withDeadline } from '../../shared/resilience/deadline';
import {
    CustomerRecord,
    SearchOptions,
    SearchStore,
    SearchStoreDocument,
    StoreHealth,
} from '../interfaces';

const storeErrors = new Counter({
    name: 'search_store_errors_total',
    help: 'Search store calls that failed',
    labelNames: ['operation', 'reason'],
});

const DUPLICATE_KEY_CODE = 11000;

export function buildSearchFilter(query: ValidatedQuery): Document {
    const path = query.spec.path;
    switch (query.kind) {
        case 'equality':
            return { [path]: query.value };
        case 'prefix':
            return { $expr: { $encStrStartsWith: { input: `$${path}`, prefix: query.value } } };
        case 'suffix':
            return { $expr: { $encStrEndsWith: { input: `$${path}`, suffix: query.value } } };
        case 'substring':
            return { $expr: { $encStrContains: { input: `$${path}`, substring: query.value } } };
    }
}

export function toSearchDocument(record: CustomerRecord, createdAt = new Date()): SearchStoreDocument {
    return {
        customer_id: record.customer_id,
        searchable_name: record.full_name,
        searchable_email: record.email,
        searchable_phone: record.phone,
        address: record.address,
        preferences: record.preferences,
        metadata: {
            category: record.category,
            status: record.status,
            tier: record.tier,
            loyalty_points: record.loyalty_points,
            last_purchase_date: record.last_purchase_date,
            lifetime_value: record.lifetime_value,
        },
        created_at: createdAt,
    };
}

export function fromSearchDocument(doc: SearchStoreDocument): CustomerRecord {
    return {
        customer_id: doc.customer_id,
        full_name: doc.searchable_name,
        email: doc.searchable_email,
        phone: doc.searchable_phone,
        address: doc.address,
        preferences: doc.preferences,
        tier: doc.metadata.tier,
        category: doc.metadata.category,
        status: doc.metadata.status,
        loyalty_points: doc.metadata.loyalty_points,
        last_purchase_date: doc.metadata.last_purchase_date,
        lifetime_value: doc.metadata.lifetime_value,
    };
}

function isDuplicateKey(error: unknown): boolean {
    return error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE;
}

@Injectable()
export class MongoSearchStore implements SearchStore {
    private readonly logger = new Logger(MongoSearchStore.name);

    constructor(private readonly mongoProvider: MongoDbProvider) { }

    async findIdentifiers(query: ValidatedQuery, options: SearchOptions): Promise<string[]> {
        const docs = await this.guard('findIdentifiers', options, () =>
            this.collection()
                .find(buildSearchFilter(query), {
                    projection: { _id: 0, customer_id: 1 },
                    limit: options.limit,
                    maxTimeMS: options.deadlineMs,
                })
                .toArray(),
        );

        // Store order, first occurrence wins.
        return [...new Set(docs.map((doc) => doc.customer_id))];
    }

    async findProjections(query: ValidatedQuery, options: SearchOptions): Promise<CustomerRecord[]> {
        const docs = await this.guard('findProjections', options, () =>
            this.collection()
                .find(buildSearchFilter(query), { limit: options.limit, maxTimeMS: options.deadlineMs })
                .toArray(),
        );

        const seen = new Set<string>();
        const records: CustomerRecord[] = [];
        for (const doc of docs) {
            if (!seen.has(doc.customer_id)) {
                seen.add(doc.customer_id);
                records.push(fromSearchDocument(doc));
            }
        }
        return records;
    }

    async insert(record: CustomerRecord, options: CallOptions): Promise<void> {
        await this.guard(
            'insert',
            options,
            () => this.collection().insertOne(toSearchDocument(record), { maxTimeMS: options.deadlineMs }),
            record.customer_id,
        );
    }

    async delete(customerId: string, options: CallOptions): Promise<void> {
        await this.guard('delete', options, () =>
            this.collection().deleteOne({ customer_id: customerId }, { maxTimeMS: options.deadlineMs }),
        );
    }

    async countByIds(customerIds: readonly string[], options: CallOptions): Promise<number> {
        if (customerIds.length === 0) {
            return 0;
        }
        return this.guard('countByIds', options, () =>
            this.collection().countDocuments(
                { customer_id: { $in: [...customerIds] } },
                { maxTimeMS: options.deadlineMs },
            ),
        );
    }

    async healthCheck(options: CallOptions): Promise<StoreHealth> {
        const healthy = await this.mongoProvider.healthCheck();
        if (!healthy) {
            return { healthy: false, count: null };
        }
        try {
            const count = await this.guard('count', options, () => this.collection().estimatedDocumentCount());
            return { healthy: true, count };
        } catch (error) {
            this.logger.warn({ msg: 'Search store count failed during health check', error });
            return { healthy: false, count: null };
        }
    }

    private collection(): Collection<SearchStoreDocument> {
        return this.mongoProvider.getCollection<SearchStoreDocument>();
    }

    /**
     * Runs a driver call under the deadline and maps its failures onto the
     * core taxonomy. `customerId` is given for writes, where a unique-key
     * collision is reported as {@link DuplicateKeyError}.
     */
    private async guard<T>(
        operation: string,
        options: CallOptions,
        run: () => Promise<T>,
        customerId?: string,
    ): Promise<T> {
        try {
            return await withDeadline(
                run(),
                options.deadlineMs,
                () => new SearchUnavailableError(`Search store ${operation} exceeded ${options.deadlineMs}ms`),
            );
        } catch (error) {
            if (customerId !== undefined && isDuplicateKey(error)) {
                storeErrors.inc({ operation, reason: 'duplicate_key' });
                throw new DuplicateKeyError('search_store', customerId, { cause: error });
            }
            storeErrors.inc({ operation, reason: 'unavailable' });
            if (error instanceof CoreError) {
                throw error;
            }
            this.logger.error({ msg: 'Search store call failed', operation, error });
            throw new SearchUnavailableError(`Search store ${operation} failed`, { cause: error });
        }
    }
}
