export * from './ILogger';
export * from './IntegerMath';
export * from './OwnershipGate';
export * from './addresses';
