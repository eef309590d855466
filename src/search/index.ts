/**
 * @fileoverview Search Barrel Export
 */

export * from './search.module';
export * from './search.service';
export * from './interfaces';
