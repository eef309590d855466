import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import request from 'supertest';
import { CustomerGenerator } from '../src/customers/customer.generator';
import { NOT_AVAILABLE_IN_MODE, RECORD_STORE, SEARCH_STORE } from '../src/customers/interfaces';
import { DEFAULT_FIELD_ENCRYPTION_TABLE, EncryptionRouter } from '../src/encryption';
import { IngestionController } from '../src/ingestion/ingestion.controller';
import { IngestionService } from '../src/ingestion/ingestion.service';
import { CUSTOMER_SOURCE } from '../src/ingestion/interfaces';
import { CustomerSearchController } from '../src/search/search.controller';
import { CustomerSearchService } from '../src/search/search.service';
import { CoreExceptionFilter, VirtualizationUnavailableError } from '../src/shared/errors';
import { LicenseGateService } from '../src/virtualization/license-gate.service';
import { VirtualizationClient } from '../src/virtualization/virtualization.client';
import { VirtualizationController } from '../src/virtualization/virtualization.controller';
import { VirtualizationService } from '../src/virtualization/virtualization.service';
import { customerFixture } from './fakes/customer-fixtures';
import { InMemoryRecordStore, InMemorySearchStore, seedBoth } from './fakes/in-memory-stores';

describe('Customer Search E2E Tests', () => {
    let app: INestApplication;
    const searchStore = new InMemorySearchStore();
    const recordStore = new InMemoryRecordStore();
    const mockVirtualizationClient = { fetchView: jest.fn() };
    const config: Record<string, unknown> = { VIRTUALIZATION_ADMISSION_POLICY: 'reject' };

    const alice = customerFixture({ full_name: 'Alice Novak', phone: '+1-555-0101', category: 'enterprise' });
    const bob = customerFixture({ full_name: 'Bob Iyer', phone: '+1-555-0102', category: 'enterprise' });

    beforeAll(async () => {
        const moduleFixture: TestingModule = await Test.createTestingModule({
            controllers: [CustomerSearchController, IngestionController, VirtualizationController],
            providers: [
                CustomerSearchService,
                IngestionService,
                VirtualizationService,
                LicenseGateService,
                { provide: EncryptionRouter, useValue: new EncryptionRouter(DEFAULT_FIELD_ENCRYPTION_TABLE) },
                { provide: SEARCH_STORE, useValue: searchStore },
                { provide: RECORD_STORE, useValue: recordStore },
                { provide: CUSTOMER_SOURCE, useClass: CustomerGenerator },
                { provide: VirtualizationClient, useValue: mockVirtualizationClient },
                {
                    provide: ConfigService,
                    useValue: { get: (key: string, defaultValue?: unknown) => config[key] ?? defaultValue },
                },
                { provide: APP_FILTER, useClass: CoreExceptionFilter },
            ],
        }).compile();

        app = moduleFixture.createNestApplication({ logger: false });
        await app.init();
    });

    afterAll(async () => {
        await app.close();
    });

    beforeEach(async () => {
        searchStore.documents.clear();
        recordStore.rows.clear();
        searchStore.clearFaults();
        recordStore.clearFaults();
        await seedBoth(searchStore, recordStore, [alice, bob]);
        searchStore.resetCalls();
        recordStore.resetCalls();
        mockVirtualizationClient.fetchView.mockReset();
    });

    describe('GET /customers/search', () => {
        it('should return one full record for an exact phone match in hybrid mode', async () => {
            const res = await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'phone', value: '+1-555-0101', mode: 'hybrid' })
                .expect(200);

            expect(res.body.records).toHaveLength(1);
            expect(res.body.records[0].customer_id).toBe(alice.customer_id);
            expect(res.body.records[0].record.full_name).toBe('Alice Novak');
            expect(res.body.partial).toBe(false);
            expect(res.body.metrics.searchMs).toBeGreaterThanOrEqual(0);
            expect(res.body.metrics.fetchMs).toBeGreaterThanOrEqual(0);
        });

        it('should return the identifier only when the record store times out', async () => {
            recordStore.failAll('fetch');

            const res = await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'phone', value: '+1-555-0101' })
                .expect(200);

            expect(res.body.partial).toBe(true);
            expect(res.body.records).toEqual([{ customer_id: alice.customer_id, record: null }]);
        });

        it('should fill record-store-only fields in search-store-only mode', async () => {
            const res = await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'category', value: 'enterprise', mode: 'search_store_only' })
                .expect(200);

            expect(res.body.records).toHaveLength(2);
            expect(res.body.records[1].record.created_at).toBe(NOT_AVAILABLE_IN_MODE);
            expect(recordStore.calls.fetch).toBe(0);
        });

        it('should return 400 for an unknown field', async () => {
            const res = await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'ssn', value: '123' })
                .expect(400);

            expect(res.body).toEqual({ statusCode: 400, error: 'UNKNOWN_FIELD', message: "Unknown field 'ssn'" });
            expect(searchStore.calls.find).toBe(0);
        });

        it('should return 400 for an unsupported operator', async () => {
            const res = await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'phone', value: '+1-555', kind: 'prefix' })
                .expect(400);

            expect(res.body.error).toBe('INVALID_QUERY');
        });

        it('should return 400 for an unknown mode', async () => {
            await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'phone', value: '+1-555-0101', mode: 'everything' })
                .expect(400);
        });

        it('should return 503 when the search store is unavailable', async () => {
            searchStore.failAll('find');

            const res = await request(app.getHttpServer())
                .get('/customers/search')
                .query({ field: 'phone', value: '+1-555-0101' })
                .expect(503);

            expect(res.body.error).toBe('SEARCH_UNAVAILABLE');
        });
    });

    describe('GET /customers/:id', () => {
        it('should return the record-store projection', async () => {
            const res = await request(app.getHttpServer()).get(`/customers/${bob.customer_id}`).expect(200);

            expect(res.body.full_name).toBe('Bob Iyer');
            expect(res.body.created_at).toBe('2026-05-01T12:00:00.000Z');
        });

        it('should return 404 for an unknown customer', async () => {
            await request(app.getHttpServer()).get('/customers/unknown-id').expect(404);
        });
    });

    describe('GET /customers/health', () => {
        it('should report both stores', async () => {
            const res = await request(app.getHttpServer()).get('/customers/health').expect(200);

            expect(res.body).toEqual({
                status: 'healthy',
                searchStore: { healthy: true, count: 2 },
                recordStore: { healthy: true, count: 2 },
            });
        });
    });

    describe('POST /admin/ingest', () => {
        it('should ingest generated customers into both stores', async () => {
            const res = await request(app.getHttpServer())
                .post('/admin/ingest')
                .query({ count: 5, batchSize: 2 })
                .expect(200);

            expect(res.body).toMatchObject({
                generated: 5,
                committed: 5,
                rolledBack: 0,
                failed: 0,
                storesAgree: true,
                searchStoreCount: 5,
                recordStoreCount: 5,
            });
            expect(res.body.batches).toHaveLength(3);
            expect(searchStore.documents.size).toBe(7);
            expect(recordStore.rows.size).toBe(7);
        });

        it('should reject a missing count', async () => {
            await request(app.getHttpServer()).post('/admin/ingest').expect(400);
        });
    });

    describe('/virtualization', () => {
        it('should search through the gate', async () => {
            mockVirtualizationClient.fetchView.mockResolvedValue({
                rows: [{ ...alice, created_at: '2026-02-01T00:00:00.000Z', updated_at: '2026-02-01T00:00:00.000Z' }],
                rowLimitReached: false,
            });

            const res = await request(app.getHttpServer())
                .get('/virtualization/customers/search')
                .query({ field: 'phone', value: '+1-555-0101' })
                .expect(200);

            expect(mockVirtualizationClient.fetchView).toHaveBeenCalledWith('customers', { phone: '+1-555-0101' });
            expect(res.body.records).toHaveLength(1);
            expect(res.body.view).toBe('customers');
        });

        it('should return 503 when the server is unavailable', async () => {
            mockVirtualizationClient.fetchView.mockRejectedValue(
                new VirtualizationUnavailableError('View customers timed out'),
            );

            const res = await request(app.getHttpServer())
                .get('/virtualization/customers/search')
                .query({ field: 'phone', value: '+1-555-0101' })
                .expect(503);

            expect(res.body.message).toBe('View customers timed out');
        });

        it('should return 429 when every license slot is held', async () => {
            const gate = app.get(LicenseGateService);
            const permits = await Promise.all([gate.acquire(), gate.acquire(), gate.acquire()]);

            try {
                const res = await request(app.getHttpServer())
                    .get('/virtualization/customers/search')
                    .query({ field: 'status', value: 'active' })
                    .expect(429);

                expect(res.body.error).toBe('WOULD_THROTTLE');
                expect(mockVirtualizationClient.fetchView).not.toHaveBeenCalled();
            } finally {
                permits.forEach((permit) => gate.release(permit));
            }
        });

        it('should report and reset license usage', async () => {
            const stats = await request(app.getHttpServer()).get('/virtualization/license').expect(200);
            expect(stats.body.ceiling).toBe(3);
            expect(stats.body.current).toBe(0);

            const reset = await request(app.getHttpServer()).post('/virtualization/license/reset').expect(200);
            expect(reset.body).toEqual({
                current: 0,
                peak: 0,
                totalAcquired: 0,
                totalThrottled: 0,
                totalViolations: 0,
                ceiling: 3,
            });
        });
    });
});
