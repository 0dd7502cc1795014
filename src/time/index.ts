export * from './modifiers';
export * from './format';
export * from './zone';
