// Re-export reasoning chain and analysis types
export * from './reasoning.js';

// Re-export calibration types
export * from './calibration.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
