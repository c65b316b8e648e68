export * from './world';
export * from './graph';
export * from './invariants';
export * from './snapshot';
export * from './diff';
