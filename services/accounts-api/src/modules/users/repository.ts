import { randomUUID } from 'node:crypto';

export interface UserRecord {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  createdAt: Date;
}

export interface CreateUserInput {
  firstName: string;
  lastName: string;
  email: string;
}

export interface UserPage {
  items: UserRecord[];
  total: number;
}

export class DuplicateEmailError extends Error {
  readonly code = 'USER_EMAIL_TAKEN';

  constructor(email: string) {
    super(`A user with email ${email} already exists.`);
    this.name = 'DuplicateEmailError';
  }
}

export interface UserRepository {
  list(options: { limit: number; offset: number }): Promise<UserPage>;
  findById(id: string): Promise<UserRecord | null>;
  create(input: CreateUserInput): Promise<UserRecord>;
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserRecord>();

  constructor(
    seed: readonly UserRecord[] = [],
    private readonly nextId: () => string = randomUUID,
    private readonly clock: () => Date = () => new Date()
  ) {
    for (const user of seed) {
      this.users.set(user.id, { ...user });
    }
  }

  async list(options: { limit: number; offset: number }): Promise<UserPage> {
    const all = [...this.users.values()].sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime());
    return {
      items: all.slice(options.offset, options.offset + options.limit).map((user) => ({ ...user })),
      total: all.length
    };
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async create(input: CreateUserInput): Promise<UserRecord> {
    const email = input.email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === email) {
        throw new DuplicateEmailError(email);
      }
    }

    const user: UserRecord = { ...input, email, id: this.nextId(), createdAt: this.clock() };
    this.users.set(user.id, user);
    return { ...user };
  }
}
