// Re-export all protocol types

export * from './common.js';
export * from './activities.js';
export * from './locations.js';
export * from './manufacturers.js';
export * from './transactions.js';
export * from './users.js';
