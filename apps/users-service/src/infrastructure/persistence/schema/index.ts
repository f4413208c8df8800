export { users, type UserRecord } from './users.js';
