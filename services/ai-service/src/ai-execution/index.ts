export * from './types';
export * from './provider-registry';
export * from './ai-execution.service';
export * from './ai-execution.module';
