export * from './tuning';
export * from './world';
