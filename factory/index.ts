export * from './TrainerFactory';
