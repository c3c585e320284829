/**
 * @txscope/pg - node-postgres adapter for @txscope/core
 *
 * @packageDocumentation
 */

export { pgLog } from './debug.js';
export type { PgQueryable } from './pg-connection.js';
export { createPgConnection } from './pg-connection.js';
export type { PgPool, PgPoolClient, PooledConnection } from './pooled-connection.js';
export { createPooledConnection } from './pooled-connection.js';
