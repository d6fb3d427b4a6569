export * from './schema';
export * from './validator';
export * from './expander';
