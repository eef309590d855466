import { CustomerRecord } from '../../src/customers/interfaces';

let sequence = 0;

/** A complete, valid customer record; identifiers are unique per call. */
export function customerFixture(overrides: Partial<CustomerRecord> = {}): CustomerRecord {
    sequence += 1;
    const n = String(sequence).padStart(4, '0');
    return {
        customer_id: `00000000-0000-4000-8000-00000000${n}`,
        full_name: `Test Person ${n}`,
        email: `test.person${n}@example.com`,
        phone: `+1-555-${n}`,
        address: { street: `${n} Elm St`, city: 'Dallas', state: 'TX', zip_code: '75201' },
        preferences: { newsletter: true, sms: false },
        tier: 'bronze',
        category: 'retail',
        status: 'active',
        loyalty_points: 10,
        last_purchase_date: '2026-01-15T09:00:00.000Z',
        lifetime_value: 250.75,
        ...overrides,
    };
}
