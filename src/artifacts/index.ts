export * from './artifact-service';
export * from './content-store';
