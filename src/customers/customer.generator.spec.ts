import { CustomerGenerator } from './customer.generator';

describe('CustomerGenerator', () => {
    const generator = new CustomerGenerator();

    it('should generate the requested number of records with unique identifiers', () => {
        const records = generator.generate(25, { startIndex: 0, runSize: 25 });
        expect(records).toHaveLength(25);
        expect(new Set(records.map((r) => r.customer_id)).size).toBe(25);
    });

    it('should keep values inside the record store ranges', () => {
        for (const record of generator.generate(40, { startIndex: 0, runSize: 40 })) {
            expect(record.phone).toMatch(/^\+1-555-\d{4}$/);
            expect(record.loyalty_points).toBeGreaterThanOrEqual(0);
            expect(record.loyalty_points).toBeLessThanOrEqual(1000);
            expect(record.lifetime_value).toBeGreaterThanOrEqual(100);
            expect(record.lifetime_value).toBeLessThanOrEqual(10000);
            expect(Math.round(record.lifetime_value * 100) / 100).toBe(record.lifetime_value);
            expect(record.address.zip_code).toMatch(/^\d{5}$/);
            expect(['retail', 'enterprise', 'government']).toContain(record.category);
            expect(['active', 'inactive', 'pending']).toContain(record.status);
            expect(Number.isNaN(Date.parse(record.last_purchase_date))).toBe(false);
        }
    });

    it('should keep the name searchable within the substring length limit', () => {
        for (const record of generator.generate(40, { startIndex: 0, runSize: 40 })) {
            expect(record.full_name.length).toBeLessThanOrEqual(60);
        }
    });

    it('should number email addresses in large runs by their position in the run', () => {
        const [record] = generator.generate(1, { startIndex: 41, runSize: 100 });
        expect(record.email).toMatch(/^[a-z]+\.[a-z]+42@example\.com$/);
    });

    it('should leave email addresses unnumbered in small runs', () => {
        const [record] = generator.generate(1, { startIndex: 0, runSize: 10 });
        expect(record.email).toMatch(/^[a-z]+\.[a-z]+@example\.com$/);
    });
});
