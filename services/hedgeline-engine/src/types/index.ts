export * from './venues';
export * from './funding';
export * from './sizing';
export * from './risk';
export * from './execution';
export * from './safety';
export * from './cycle';
export * from './events';
