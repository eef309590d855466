/**
 * @fileoverview PostgreSQL Record Store
 *
 * RecordStore adapter over the pgcrypto-encrypted customers table. PII is
 * encrypted and decrypted inside SQL (`pgp_sym_encrypt` / `pgp_sym_decrypt`)
 * so plaintext never sits in a column.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Counter } from 'prom-client';
import { In, QueryFailedError, Repository } from 'typeorm';
import { z } from 'zod';
import { CoreError, DuplicateKeyError, RecordStoreUnavailableError } from '../../shared/errors';
import { CallOptions, withDeadline } from '../../shared/resilience/deadline';
import { CustomerEntity } from '../entities';
import {
    CustomerAddress,
    CustomerPreferences,
    CustomerRecord,
    FullProjection,
    RecordStore,
    StoreHealth,
} from '../interfaces';

const storeErrors = new Counter({
    name: 'record_store_errors_total',
    help: 'Record store calls that failed',
    labelNames: ['operation', 'reason'],
});

const UNIQUE_VIOLATION = '23505';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Only UUIDs can match the primary key; anything else is simply absent. */
function storableIds(customerIds: readonly string[]): string[] {
    return customerIds.filter((id) => UUID_PATTERN.test(id));
}

/* -------------------------------------------------------------------------- */
/*                              Row decoding                                   */
/* -------------------------------------------------------------------------- */

const RawCustomerRowSchema = z.object({
    customer_id: z.string(),
    full_name: z.string(),
    email: z.string(),
    phone: z.string().nullable(),
    address: z.string().nullable(),
    preferences: z.string().nullable(),
    tier: z.string(),
    category: z.string(),
    status: z.string(),
    loyalty_points: z.coerce.number().int(),
    last_purchase_date: z.string(),
    lifetime_value: z.coerce.number(),
    created_at: z.coerce.date(),
    updated_at: z.coerce.date(),
});

export type RawCustomerRow = z.input<typeof RawCustomerRowSchema>;

const AddressSchema = z.object({
    street: z.string(),
    city: z.string(),
    state: z.string(),
    zip_code: z.string(),
});

const PreferencesSchema = z.object({
    newsletter: z.boolean(),
    sms: z.boolean(),
});

export const EMPTY_ADDRESS: CustomerAddress = { street: '', city: '', state: '', zip_code: '' };
export const EMPTY_PREFERENCES: CustomerPreferences = { newsletter: false, sms: false };

/** Decrypted JSON column; anything unreadable becomes `fallback`. */
function decodeJsonColumn<T>(text: string | null, schema: z.ZodType<T>, fallback: T): T {
    if (text === null) {
        return fallback;
    }
    try {
        const parsed = schema.safeParse(JSON.parse(text));
        return parsed.success ? parsed.data : fallback;
    } catch {
        return fallback;
    }
}

export function decodeCustomerRow(raw: unknown): FullProjection {
    const row = RawCustomerRowSchema.parse(raw);
    return {
        customer_id: row.customer_id,
        full_name: row.full_name,
        email: row.email,
        phone: row.phone ?? '',
        address: decodeJsonColumn(row.address, AddressSchema, EMPTY_ADDRESS),
        preferences: decodeJsonColumn(row.preferences, PreferencesSchema, EMPTY_PREFERENCES),
        tier: row.tier,
        category: row.category,
        status: row.status,
        loyalty_points: row.loyalty_points,
        last_purchase_date: row.last_purchase_date,
        lifetime_value: row.lifetime_value,
        created_at: row.created_at.toISOString(),
        updated_at: row.updated_at.toISOString(),
    };
}

function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) {
        return false;
    }
    const driverError: unknown = error.driverError;
    return (
        typeof driverError === 'object' &&
        driverError !== null &&
        'code' in driverError &&
        driverError.code === UNIQUE_VIOLATION
    );
}

/* -------------------------------------------------------------------------- */
/*                              Adapter                                        */
/* -------------------------------------------------------------------------- */

@Injectable()
export class PostgresRecordStore implements RecordStore {
    private readonly logger = new Logger(PostgresRecordStore.name);
    private readonly encryptionKey: string;

    constructor(
        @InjectRepository(CustomerEntity)
        private readonly customerRepo: Repository<CustomerEntity>,
        configService: ConfigService,
    ) {
        this.encryptionKey =
            configService.get<string>('RECORD_STORE_ENCRYPTION_KEY') ??
            configService.getOrThrow<string>('ENCRYPTION_MASTER_KEY');
    }

    async fetchMany(customerIds: readonly string[], options: CallOptions): Promise<Map<string, FullProjection>> {
        const result = new Map<string, FullProjection>();
        const ids = storableIds(customerIds);
        if (ids.length === 0) {
            return result;
        }

        const rows = await this.guard('fetchMany', options, () =>
            this.customerRepo
                .createQueryBuilder('customer')
                .select('customer.id', 'customer_id')
                .addSelect('pgp_sym_decrypt(customer.full_name_encrypted, :encryptionKey)', 'full_name')
                .addSelect('pgp_sym_decrypt(customer.email_encrypted, :encryptionKey)', 'email')
                .addSelect('pgp_sym_decrypt(customer.phone_encrypted, :encryptionKey)', 'phone')
                .addSelect('pgp_sym_decrypt(customer.address_encrypted, :encryptionKey)', 'address')
                .addSelect('pgp_sym_decrypt(customer.preferences_encrypted, :encryptionKey)', 'preferences')
                .addSelect('customer.tier', 'tier')
                .addSelect('customer.category', 'category')
                .addSelect('customer.status', 'status')
                .addSelect('customer.loyalty_points', 'loyalty_points')
                .addSelect('customer.last_purchase_date', 'last_purchase_date')
                .addSelect('customer.lifetime_value', 'lifetime_value')
                .addSelect('customer.created_at', 'created_at')
                .addSelect('customer.updated_at', 'updated_at')
                .where('customer.id IN (:...ids)', { ids })
                .setParameter('encryptionKey', this.encryptionKey)
                .getRawMany<Record<string, unknown>>(),
        );

        for (const raw of rows) {
            const projection = this.decode(raw);
            result.set(projection.customer_id, projection);
        }
        return result;
    }

    /**
     * Runs inside a transaction whose `statement_timeout` matches the call
     * deadline, so the server abandons the write rather than committing it
     * after the caller has given up.
     */
    async insert(record: CustomerRecord, options: CallOptions): Promise<void> {
        await this.guard(
            'insert',
            options,
            () =>
                this.customerRepo.manager.transaction(async (manager) => {
                    await manager.query('SELECT set_config($1, $2, true)', [
                        'statement_timeout',
                        String(Math.ceil(options.deadlineMs)),
                    ]);
                    await manager
                        .createQueryBuilder()
                        .insert()
                        .into(CustomerEntity)
                        .values({
                            id: record.customer_id,
                            full_name_encrypted: () => 'pgp_sym_encrypt(:fullName, :encryptionKey)',
                            email_encrypted: () => 'pgp_sym_encrypt(:email, :encryptionKey)',
                            phone_encrypted: () => 'pgp_sym_encrypt(:phone, :encryptionKey)',
                            address_encrypted: () => 'pgp_sym_encrypt(:address, :encryptionKey)',
                            preferences_encrypted: () => 'pgp_sym_encrypt(:preferences, :encryptionKey)',
                            tier: record.tier,
                            category: record.category,
                            status: record.status,
                            loyalty_points: record.loyalty_points,
                            last_purchase_date: record.last_purchase_date,
                            lifetime_value: record.lifetime_value.toFixed(2),
                        })
                        .setParameters({
                            fullName: record.full_name,
                            email: record.email,
                            phone: record.phone,
                            address: JSON.stringify(record.address),
                            preferences: JSON.stringify(record.preferences),
                            encryptionKey: this.encryptionKey,
                        })
                        .execute();
                }),
            record.customer_id,
        );
    }

    async delete(customerId: string, options: CallOptions): Promise<void> {
        if (storableIds([customerId]).length === 0) {
            return;
        }
        await this.guard('delete', options, () => this.customerRepo.delete({ id: customerId }));
    }

    async countByIds(customerIds: readonly string[], options: CallOptions): Promise<number> {
        const ids = storableIds(customerIds);
        if (ids.length === 0) {
            return 0;
        }
        return this.guard('countByIds', options, () =>
            this.customerRepo.count({ where: { id: In(ids) } }),
        );
    }

    async healthCheck(options: CallOptions): Promise<StoreHealth> {
        try {
            const count = await this.guard('count', options, () => this.customerRepo.count());
            return { healthy: true, count };
        } catch (error) {
            this.logger.warn({ msg: 'Record store health check failed', error });
            return { healthy: false, count: null };
        }
    }

    /**
     * A row that fails validation means the table and this adapter disagree;
     * that is reported as the store being unusable rather than dropped.
     */
    private decode(raw: unknown): FullProjection {
        try {
            return decodeCustomerRow(raw);
        } catch (error) {
            this.logger.error({ msg: 'Record store returned a malformed row', error });
            throw new RecordStoreUnavailableError('Record store returned a malformed row', { cause: error });
        }
    }

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
                () => new RecordStoreUnavailableError(`Record store ${operation} exceeded ${options.deadlineMs}ms`),
            );
        } catch (error) {
            if (customerId !== undefined && isUniqueViolation(error)) {
                storeErrors.inc({ operation, reason: 'duplicate_key' });
                throw new DuplicateKeyError('record_store', customerId, { cause: error });
            }
            storeErrors.inc({ operation, reason: 'unavailable' });
            if (error instanceof CoreError) {
                throw error;
            }
            this.logger.error({ msg: 'Record store call failed', operation, error });
            throw new RecordStoreUnavailableError(`Record store ${operation} failed`, { cause: error });
        }
    }
}
