export { pool, connectDatabase } from './connection';
export { withTransaction } from './transaction';
