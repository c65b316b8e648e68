export * from './indices';
export * from './EndgameDetector';
