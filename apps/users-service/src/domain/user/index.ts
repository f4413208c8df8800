export {
	userSchema,
	toPublicUser,
	USERNAME_PATTERN,
	type User,
	type NewUser,
	type UserPatch,
	type PublicUser,
} from './user.js';
