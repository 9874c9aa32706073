export * from './classifiedFailure';
export { CircuitOpenError } from './circuitOpenError';
export { ConfigValidationError } from './configValidationError';
