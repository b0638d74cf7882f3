/**
 * Visual Sequencer - public API
 */

export * from './lib/core/types';
export * from './lib/core/config';
export * from './lib/core/errors';
export * from './lib/core/logger';
export * from './lib/core/control';
export * from './lib/core/time-parser';
export * from './lib/core/trigger-evaluator';
export * from './lib/core/runner';
export * from './lib/core/workspace';

export * from './lib/auto/color';
export * from './lib/auto/screen';
export * from './lib/auto/image-matcher';
export * from './lib/auto/number-reader';
export * from './lib/auto/item-scan';
export * from './lib/auto/controller';
export * from './lib/auto/stub-backend';
export * from './lib/auto/windows-backend';
