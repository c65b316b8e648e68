export * from './tick';
export * from './history';
export * from './simulation';
