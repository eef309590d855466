/**
 * @fileoverview Virtualization Barrel Export
 */

export * from './virtualization.module';
export * from './virtualization.service';
export * from './license-gate.service';
export * from './interfaces';
