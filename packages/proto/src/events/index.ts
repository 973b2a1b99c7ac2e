export * from './room';
export * from './chat';
export * from './board';
export * from './notification';
