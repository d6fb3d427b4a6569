export * from './provisioner';
