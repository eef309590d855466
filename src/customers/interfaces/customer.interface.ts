/**
 * @fileoverview Customer record types
 *
 * One logical customer exists in both stores under the same `customer_id`.
 * The search store keeps the searchable projection; the record store keeps
 * the authoritative full projection.
 */

export interface CustomerAddress {
    street: string;
    city: string;
    state: string;
    zip_code: string;
}

export interface CustomerPreferences {
    newsletter: boolean;
    sms: boolean;
}

/** Attributes shared by both stores. */
export interface CustomerRecord {
    customer_id: string;
    full_name: string;
    email: string;
    phone: string;
    address: CustomerAddress;
    preferences: CustomerPreferences;
    tier: string;
    category: string;
    status: string;
    loyalty_points: number;
    last_purchase_date: string;
    lifetime_value: number;
}

/** Attributes only the record store assigns and tracks. */
export const RECORD_STORE_ONLY_FIELDS = ['created_at', 'updated_at'] as const;

export type RecordStoreOnlyField = (typeof RECORD_STORE_ONLY_FIELDS)[number];

/** The complete, authoritative attribute set held by the record store. */
export interface FullProjection extends CustomerRecord {
    created_at: string;
    updated_at: string;
}

/** Placeholder for attributes the current operating mode cannot supply. */
export const NOT_AVAILABLE_IN_MODE = 'not_available_in_mode';

/**
 * What a search returns per hit. Same shape in every mode; record-store-only
 * attributes hold {@link NOT_AVAILABLE_IN_MODE} when the record store was
 * not consulted.
 */
export type CustomerView = FullProjection;
