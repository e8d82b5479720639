/**
 * Database schema barrel export
 * Table definitions for the externally managed market database
 */

export * from './companies.js';
export * from './historical-data.js';
