export * from './constants';
export * from './errors';
export * from './logging.utils';
export * from './review-types';
export * from './summary-types';
