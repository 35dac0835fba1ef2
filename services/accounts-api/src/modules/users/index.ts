export {
  DuplicateEmailError,
  InMemoryUserRepository,
  type CreateUserInput,
  type UserPage,
  type UserRecord,
  type UserRepository
} from './repository.js';
