export * from './customer.interface';
export * from './customer-store.interface';
export * from './search-document.interface';
