export * from './license-gate.interface';
export * from './virtualization.interface';
