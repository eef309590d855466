/**
 * @fileoverview Customer Search Orchestrator Tests
 */

import { NOT_AVAILABLE_IN_MODE, RECORD_STORE_ONLY_FIELDS } from '../customers/interfaces';
import { DEFAULT_FIELD_ENCRYPTION_TABLE, EncryptionRouter } from '../encryption';
import { InvalidQueryError, SearchUnavailableError, UnknownFieldError } from '../shared/errors';
import { customerFixture } from '../../test/fakes/customer-fixtures';
import { InMemoryRecordStore, InMemorySearchStore, seedBoth } from '../../test/fakes/in-memory-stores';
import { OperatingMode } from './interfaces';
import { CustomerSearchService } from './search.service';

describe('CustomerSearchService', () => {
    let service: CustomerSearchService;
    let searchStore: InMemorySearchStore;
    let recordStore: InMemoryRecordStore;
    let mockConfigService: any;

    const alice = customerFixture({ full_name: 'Alice Novak', email: 'alice.novak@example.com', category: 'enterprise' });
    const bob = customerFixture({ full_name: 'Bob Iyer', email: 'bob.iyer@example.com', category: 'enterprise' });
    const carol = customerFixture({ full_name: 'Carol Novak', email: 'carol.novak@example.com', category: 'retail' });

    beforeEach(async () => {
        searchStore = new InMemorySearchStore();
        recordStore = new InMemoryRecordStore();
        mockConfigService = {
            get: jest.fn((_key: string, defaultValue: unknown) => defaultValue),
        };
        service = new CustomerSearchService(
            new EncryptionRouter(DEFAULT_FIELD_ENCRYPTION_TABLE),
            searchStore,
            recordStore,
            mockConfigService,
        );

        await seedBoth(searchStore, recordStore, [alice, bob, carol]);
        searchStore.resetCalls();
        recordStore.resetCalls();
    });

    describe('validation', () => {
        it('should reject an unknown field without contacting any store', async () => {
            await expect(
                service.search({ field: 'ssn', value: '123', mode: OperatingMode.Hybrid }),
            ).rejects.toThrow(UnknownFieldError);
            expect(searchStore.calls.find).toBe(0);
            expect(recordStore.calls.fetch).toBe(0);
        });

        it('should reject an over-long substring without contacting any store', async () => {
            await expect(
                service.search({ field: 'name', value: 'abcdefghijklmnop', mode: OperatingMode.SearchStoreOnly }),
            ).rejects.toThrow(InvalidQueryError);
            expect(searchStore.calls.find).toBe(0);
        });

        it('should reject an unsupported operator without contacting any store', async () => {
            await expect(
                service.search({ field: 'phone', value: '+1-555', queryKind: 'prefix', mode: OperatingMode.Hybrid }),
            ).rejects.toThrow(InvalidQueryError);
            expect(searchStore.calls.find).toBe(0);
        });

        it('should reject a limit outside the allowed range', async () => {
            await expect(
                service.search({ field: 'category', value: 'retail', mode: OperatingMode.Hybrid, limit: 0 }),
            ).rejects.toThrow('limit must be an integer between 1 and 10000');
        });
    });

    describe('hybrid mode', () => {
        it('should return record-store records in search-store order', async () => {
            const result = await service.search({ field: 'category', value: 'enterprise', mode: OperatingMode.Hybrid });

            expect(result.mode).toBe(OperatingMode.Hybrid);
            expect(result.queryKind).toBe('equality');
            expect(result.partial).toBe(false);
            expect(result.records.map((hit) => hit.customer_id)).toEqual([alice.customer_id, bob.customer_id]);
            expect(result.records[0].record?.created_at).toBe('2026-05-01T12:00:00.000Z');
            expect(result.metrics.resultsCount).toBe(2);
        });

        it('should not contact the record store when nothing matches', async () => {
            const result = await service.search({ field: 'phone', value: '+1-555-9999', mode: OperatingMode.Hybrid });

            expect(result.records).toEqual([]);
            expect(result.partial).toBe(false);
            expect(recordStore.calls.fetch).toBe(0);
        });

        it('should flag identifiers missing from the record store as a partial result', async () => {
            recordStore.rows.delete(bob.customer_id);

            const result = await service.search({ field: 'category', value: 'enterprise', mode: OperatingMode.Hybrid });

            expect(result.partial).toBe(true);
            expect(result.records).toEqual([
                { customer_id: alice.customer_id, record: expect.objectContaining({ full_name: 'Alice Novak' }) },
                { customer_id: bob.customer_id, record: null },
            ]);
            expect(result.warnings).toEqual([
                expect.objectContaining({ reason: 'missing_from_record_store', customerIds: [bob.customer_id] }),
            ]);
        });

        it('should degrade to identifiers only when the record store is unavailable', async () => {
            recordStore.failAll('fetch');

            const result = await service.search({ field: 'email', value: 'alice', mode: OperatingMode.Hybrid });

            expect(result.partial).toBe(true);
            expect(result.records).toEqual([{ customer_id: alice.customer_id, record: null }]);
            expect(result.warnings[0].reason).toBe('record_store_unavailable');
        });

        it('should fail the request when the search store is unavailable', async () => {
            searchStore.failAll('find');

            await expect(
                service.search({ field: 'category', value: 'retail', mode: OperatingMode.Hybrid }),
            ).rejects.toThrow(SearchUnavailableError);
            expect(recordStore.calls.fetch).toBe(0);
        });

        it('should cap results at the requested limit', async () => {
            const result = await service.search({
                field: 'category',
                value: 'enterprise',
                mode: OperatingMode.Hybrid,
                limit: 1,
            });
            expect(result.records.map((hit) => hit.customer_id)).toEqual([alice.customer_id]);

            const byName = await service.search({ field: 'name', value: 'novak', mode: OperatingMode.Hybrid, limit: 1 });
            expect(byName.records.map((hit) => hit.customer_id)).toEqual([alice.customer_id]);
        });
    });

    describe('search-store-only mode', () => {
        it('should fill record-store-only fields with the placeholder', async () => {
            const result = await service.search({
                field: 'name',
                value: 'novak',
                mode: OperatingMode.SearchStoreOnly,
            });

            expect(result.records.map((hit) => hit.customer_id)).toEqual([alice.customer_id, carol.customer_id]);
            for (const hit of result.records) {
                expect(hit.record?.created_at).toBe(NOT_AVAILABLE_IN_MODE);
                expect(hit.record?.updated_at).toBe(NOT_AVAILABLE_IN_MODE);
            }
            expect(recordStore.calls.fetch).toBe(0);
        });

        it('should fail the request when the search store is unavailable', async () => {
            searchStore.failAll('find');
            await expect(
                service.search({ field: 'status', value: 'active', mode: OperatingMode.SearchStoreOnly }),
            ).rejects.toThrow(SearchUnavailableError);
        });
    });

    describe('mode parity', () => {
        it('should return the same shape and shared values in both modes', async () => {
            const request = { field: 'category', value: 'enterprise' };
            const hybrid = await service.search({ ...request, mode: OperatingMode.Hybrid });
            const storeOnly = await service.search({ ...request, mode: OperatingMode.SearchStoreOnly });

            expect(storeOnly.records.map((h) => h.customer_id)).toEqual(hybrid.records.map((h) => h.customer_id));

            hybrid.records.forEach((hybridHit, index) => {
                const storeOnlyRecord = storeOnly.records[index].record;
                const hybridRecord = hybridHit.record;
                expect(hybridRecord).not.toBeNull();
                expect(storeOnlyRecord).not.toBeNull();
                if (!hybridRecord || !storeOnlyRecord) {
                    return;
                }

                expect(Object.keys(storeOnlyRecord).sort()).toEqual(Object.keys(hybridRecord).sort());
                for (const field of RECORD_STORE_ONLY_FIELDS) {
                    expect(storeOnlyRecord[field]).toBe(NOT_AVAILABLE_IN_MODE);
                    expect(hybridRecord[field]).not.toBe(NOT_AVAILABLE_IN_MODE);
                }
                const { created_at: _a, updated_at: _b, ...sharedHybrid } = hybridRecord;
                const { created_at: _c, updated_at: _d, ...sharedStoreOnly } = storeOnlyRecord;
                expect(sharedStoreOnly).toEqual(sharedHybrid);
            });
        });
    });

    describe('metrics', () => {
        it('should report non-negative stage latencies in every mode', async () => {
            for (const mode of [OperatingMode.Hybrid, OperatingMode.SearchStoreOnly]) {
                const { metrics } = await service.search({ field: 'status', value: 'active', mode });
                expect(metrics.searchMs).toBeGreaterThanOrEqual(0);
                expect(metrics.fetchMs).toBeGreaterThanOrEqual(0);
                expect(metrics.decryptMs).toBeGreaterThanOrEqual(0);
                expect(metrics.totalMs).toBeGreaterThanOrEqual(metrics.searchMs);
                expect(metrics.resultsCount).toBe(3);
            }
        });
    });

    describe('findById', () => {
        it('should return the record-store projection', async () => {
            const found = await service.findById(carol.customer_id);
            expect(found?.email).toBe('carol.novak@example.com');
        });

        it('should return null for an unknown identifier', async () => {
            await expect(service.findById('no-such-id')).resolves.toBeNull();
        });
    });

    describe('health', () => {
        it('should report both stores', async () => {
            await expect(service.health()).resolves.toEqual({
                status: 'healthy',
                searchStore: { healthy: true, count: 3 },
                recordStore: { healthy: true, count: 3 },
            });
        });

        it('should report degraded when one store is down', async () => {
            recordStore.failAll('health');
            const health = await service.health();
            expect(health.status).toBe('degraded');
            expect(health.recordStore).toEqual({ healthy: false, count: null });
        });
    });
});
