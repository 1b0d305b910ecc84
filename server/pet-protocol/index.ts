export * from './types';
export * from './device-profile';
export * from './pediatric';
export * from './physics-model';
export * from './protocol-solvers';
export * from './protocol-planner';
export * from './k-factor-store';
export * from './session-log';
