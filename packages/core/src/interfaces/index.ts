/**
 * Core Interfaces
 *
 * Framework-agnostic interfaces for the host database layer.
 *
 * @packageDocumentation
 */

export type { ConnectionSource, DatabaseConnection } from './connection.js';
