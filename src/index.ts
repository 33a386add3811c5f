// Exit code value type and catalog
export * from './code';

// Classification of failures
export * from './io';
export * from './process';

// Exit error wrapper and reporting
export * from './exit';

// Options, validation and logging
export * from './config';
export * from './schemas';
export * from './logging';
export * from './types';
