export * from './mongodb.module';
export * from './mongodb.provider';
