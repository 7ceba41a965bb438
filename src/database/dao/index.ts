/**
 * DAO (Data Access Object) exports
 */

export * from './ChatDAO';
export * from './MessageDAO';
