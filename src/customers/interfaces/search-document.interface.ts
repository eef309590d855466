import { CustomerAddress, CustomerPreferences } from './customer.interface';

/**
 * Customer document as stored in the search store, before encryption.
 * Paths here must agree with the field encryption table.
 */
export interface SearchStoreDocument {
    /** Plain identifier shared with the record store; unique index. */
    customer_id: string;
    searchable_name: string;
    searchable_email: string;
    searchable_phone: string;
    address: CustomerAddress;
    preferences: CustomerPreferences;
    metadata: {
        category: string;
        status: string;
        tier: string;
        loyalty_points: number;
        last_purchase_date: string;
        lifetime_value: number;
    };
    created_at: Date;
}
