/**
 * @fileoverview Customers Module
 *
 * Binds the store capability tokens to their concrete adapters: MongoDB
 * (Queryable Encryption) for search, PostgreSQL (pgcrypto) for records.
 */

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EncryptionModule } from '../encryption';
import { SharedMongoDbModule } from '../shared/mongodb';
import { CustomerGenerator } from './customer.generator';
import { CustomerEntity } from './entities';
import { RECORD_STORE, SEARCH_STORE } from './interfaces';
import { MongoSearchStore } from './stores/mongo-search.store';
import { PostgresRecordStore } from './stores/postgres-record.store';

@Module({
    imports: [
        TypeOrmModule.forFeature([CustomerEntity]),
        SharedMongoDbModule,
        EncryptionModule,
    ],
    providers: [
        MongoSearchStore,
        PostgresRecordStore,
        CustomerGenerator,
        { provide: SEARCH_STORE, useExisting: MongoSearchStore },
        { provide: RECORD_STORE, useExisting: PostgresRecordStore },
    ],
    exports: [SEARCH_STORE, RECORD_STORE, CustomerGenerator, EncryptionModule],
})
export class CustomersModule { }
