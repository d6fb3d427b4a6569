export * from './command-runner';
export * from './templates';
export * from './state-machine';
export * from './job-runner';
export * from './build-executor';
export * from './unified-diff';
export * from './drift-detector';
export * from './image-publisher';
export * from './gate';
export * from './orchestrator';
