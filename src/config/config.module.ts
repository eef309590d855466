import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';

const positiveInt = (fallback: number) =>
    z.string().default(String(fallback)).transform(Number).pipe(z.number().int().positive());

// Zod schema for environment validation
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: positiveInt(3000),

    // Search store (MongoDB Queryable Encryption)
    MONGODB_URI: z.string().startsWith('mongodb'),
    MONGODB_DATABASE: z.string().default('customer_search'),
    MONGODB_COLLECTION: z.string().default('customers'),
    MONGODB_KEY_VAULT_NAMESPACE: z.string().regex(/^[^.]+\.[^.]+$/, 'must be <database>.<collection>').default('encryption.__keyVault'),
    ENCRYPTION_MASTER_KEY: z
        .string()
        .refine((value) => Buffer.from(value, 'base64').length === 96, 'must be 96 bytes, base64-encoded'),
    CRYPT_SHARED_LIB_PATH: z.string().optional(),
    FIELD_ENCRYPTION_TABLE: z.string().optional(),

    // Record store (PostgreSQL + pgcrypto)
    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: positiveInt(5432),
    POSTGRES_USER: z.string().default('postgres'),
    POSTGRES_PASSWORD: z.string().optional(),
    POSTGRES_DB: z.string().default('customers'),
    RECORD_STORE_ENCRYPTION_KEY: z.string().min(16).optional(),

    // Search and ingestion
    STORE_DEADLINE_MS: positiveInt(5000),
    SEARCH_DEFAULT_LIMIT: positiveInt(100),
    SEARCH_MAX_LIMIT: positiveInt(10000),
    INGEST_BATCH_SIZE: positiveInt(100),
    INGEST_ON_MISMATCH: z.enum(['continue', 'halt']).default('continue'),

    // Data virtualization
    VIRTUALIZATION_BASE_URL: z.string().url().default('http://localhost:9090/rest/customer_views'),
    VIRTUALIZATION_USER: z.string().default('admin'),
    VIRTUALIZATION_PASSWORD: z.string().default('admin'),
    VIRTUALIZATION_TIMEOUT_MS: positiveInt(30000),
    VIRTUALIZATION_MAX_CONCURRENT: positiveInt(3),
    VIRTUALIZATION_MAX_ROWS: positiveInt(10000),
    VIRTUALIZATION_ACQUIRE_TIMEOUT_MS: positiveInt(30000),
    VIRTUALIZATION_ADMISSION_POLICY: z.enum(['block', 'reject']).default('block'),

    // Observability
    LOKI_HOST: z.string().url().default('http://localhost:3100'),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
}).refine((env) => env.SEARCH_DEFAULT_LIMIT <= env.SEARCH_MAX_LIMIT, {
    message: 'SEARCH_DEFAULT_LIMIT must not exceed SEARCH_MAX_LIMIT',
    path: ['SEARCH_DEFAULT_LIMIT'],
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
    const result = envSchema.safeParse(config);
    if (!result.success) {
        console.error('Invalid environment configuration:');
        console.error(result.error.format());
        throw new Error('Invalid environment configuration');
    }
    return result.data;
}

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            envFilePath: ['.env.local', '.env'],
            validate: validateEnv,
        }),
    ],
    providers: [ConfigService],
    exports: [ConfigService],
})
export class ConfigModule { }
