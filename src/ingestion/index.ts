/**
 * @fileoverview Ingestion Barrel Export
 */

export * from './ingestion.module';
export * from './ingestion.service';
export * from './interfaces';
