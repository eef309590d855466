/**
 * @fileoverview Environment Validation Tests
 */

import { validateEnv } from './config.module';

describe('validateEnv', () => {
    const masterKey = Buffer.alloc(96, 7).toString('base64');
    const minimal = { MONGODB_URI: 'mongodb://localhost:27017', ENCRYPTION_MASTER_KEY: masterKey };

    beforeEach(() => {
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should apply defaults and coerce numbers', () => {
        const env = validateEnv(minimal);

        expect(env.PORT).toBe(3000);
        expect(env.STORE_DEADLINE_MS).toBe(5000);
        expect(env.SEARCH_MAX_LIMIT).toBe(10000);
        expect(env.INGEST_ON_MISMATCH).toBe('continue');
        expect(env.VIRTUALIZATION_MAX_CONCURRENT).toBe(3);
        expect(env.VIRTUALIZATION_ADMISSION_POLICY).toBe('block');
        expect(env.POSTGRES_DB).toBe('customers');
    });

    it('should parse supplied numeric values', () => {
        const env = validateEnv({ ...minimal, VIRTUALIZATION_MAX_CONCURRENT: '5', INGEST_BATCH_SIZE: '250' });

        expect(env.VIRTUALIZATION_MAX_CONCURRENT).toBe(5);
        expect(env.INGEST_BATCH_SIZE).toBe(250);
    });

    it.each([
        ['a missing search store URI', { ENCRYPTION_MASTER_KEY: masterKey }],
        ['a short master key', { ...minimal, ENCRYPTION_MASTER_KEY: Buffer.alloc(32).toString('base64') }],
        ['a zero ceiling', { ...minimal, VIRTUALIZATION_MAX_CONCURRENT: '0' }],
        ['a non-numeric deadline', { ...minimal, STORE_DEADLINE_MS: 'soon' }],
        ['an unknown mismatch policy', { ...minimal, INGEST_ON_MISMATCH: 'retry' }],
        ['a default limit above the maximum', { ...minimal, SEARCH_DEFAULT_LIMIT: '500', SEARCH_MAX_LIMIT: '100' }],
        ['a key vault namespace without a collection', { ...minimal, MONGODB_KEY_VAULT_NAMESPACE: 'encryption' }],
    ])('should reject %s', (_case, env) => {
        expect(() => validateEnv(env)).toThrow('Invalid environment configuration');
    });
});
