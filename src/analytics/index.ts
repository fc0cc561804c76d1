export * from './types';
export * from './periods';
export * from './streak-calculator';
export * from './completion-rate';
export * from './overview';
export * from './weekday-distribution';
