export * from './wav'
