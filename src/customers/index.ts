/**
 * @fileoverview Customers Barrel Export
 */

export * from './customers.module';
export * from './customer.generator';
export * from './interfaces';
export * from './entities';
export * from './stores/mongo-search.store';
export * from './stores/postgres-record.store';
