export * from './ingestion.interface';
