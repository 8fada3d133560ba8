export * from './Emotion';
export * from './CheckInRecord';
export * from './CheckInStep';
