export * from './search.interface';
