export * from './hex';
export * from './protocol';
export * from './sessionTypes';
