// @waypoint/protocol
// Domain types shared by every layer of the tracker: activities, locations,
// equipment manufacturers, transactions and users.
//
// This package carries no I/O. Storage lives in @waypoint/repositories.

export * from './types/index.js';
export { refId } from './refs.js';
export { calcTransactionsTotal } from './finance/totals.js';
