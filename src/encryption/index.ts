/**
 * @fileoverview Encryption Barrel Export
 */

export * from './encryption.module';
export * from './encryption-router';
export * from './field-encryption.table';
export * from './interfaces';
