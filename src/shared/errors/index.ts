export * from './core.errors';
export * from './core-exception.filter';
