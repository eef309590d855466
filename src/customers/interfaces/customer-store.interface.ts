/**
 * @fileoverview Store capability interfaces
 *
 * The core talks to both stores only through these interfaces. Adapters map
 * every driver failure onto the core error taxonomy and honour the deadline
 * of each call.
 */

import { ValidatedQuery } from '../../encryption/interfaces';
import { CallOptions } from '../../shared/resilience/deadline';
import { CustomerRecord, FullProjection } from './customer.interface';

export const SEARCH_STORE = Symbol('SEARCH_STORE');
export const RECORD_STORE = Symbol('RECORD_STORE');

export interface SearchOptions extends CallOptions {
    limit: number;
}

export interface StoreHealth {
    healthy: boolean;
    /** Document count, when the store answered. */
    count: number | null;
}

export interface SearchStore {
    /**
     * Identifiers matching the query, in store order, without duplicates.
     *
     * @throws SearchUnavailableError
     */
    findIdentifiers(query: ValidatedQuery, options: SearchOptions): Promise<string[]>;

    /**
     * Decrypted projections matching the query, in store order.
     *
     * @throws SearchUnavailableError
     */
    findProjections(query: ValidatedQuery, options: SearchOptions): Promise<CustomerRecord[]>;

    /** @throws DuplicateKeyError | SearchUnavailableError */
    insert(record: CustomerRecord, options: CallOptions): Promise<void>;

    /** Idempotent. */
    delete(customerId: string, options: CallOptions): Promise<void>;

    countByIds(customerIds: readonly string[], options: CallOptions): Promise<number>;

    healthCheck(options: CallOptions): Promise<StoreHealth>;
}

export interface RecordStore {
    /**
     * Full projections keyed by identifier. Identifiers the store does not
     * hold are absent from the map.
     *
     * @throws RecordStoreUnavailableError
     */
    fetchMany(customerIds: readonly string[], options: CallOptions): Promise<Map<string, FullProjection>>;

    /** @throws DuplicateKeyError | RecordStoreUnavailableError */
    insert(record: CustomerRecord, options: CallOptions): Promise<void>;

    /** Idempotent. */
    delete(customerId: string, options: CallOptions): Promise<void>;

    countByIds(customerIds: readonly string[], options: CallOptions): Promise<number>;

    healthCheck(options: CallOptions): Promise<StoreHealth>;
}
