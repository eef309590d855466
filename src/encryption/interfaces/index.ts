export * from './field-encryption.interface';
