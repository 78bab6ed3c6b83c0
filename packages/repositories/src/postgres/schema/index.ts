// Re-export all schema tables
export * from './users.js';
export * from './locations.js';
export * from './activities.js';
export * from './manufacturers.js';
export * from './transactions.js';
