export { createUserRepository, USER_UNIQUE_CONSTRAINTS, type UserRepository } from './user-repository.js';
