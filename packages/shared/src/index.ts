export * from './constants/index.js';

export * from './utils/tooth.utils.js';
export * from './utils/money.utils.js';
export * from './utils/date.utils.js';
export * from './utils/csv.utils.js';
