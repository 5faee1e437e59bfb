export * from './errors';
export * from './schemas';
export * from './version';
export * from './diagnostics';
export * from './context';
