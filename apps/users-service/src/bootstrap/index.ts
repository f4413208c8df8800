export { createUsersApp, findMigrationsDir, type UsersApp, type UsersAppConfig } from './users-app.js';
