// test/support/in-memory-users.repository.ts
import { type UserCredentials, UsersRepository } from '@/modules/users/users.repository';

export class InMemoryUsersRepository extends UsersRepository {
  private readonly users = new Map<string, UserCredentials>();

  constructor(users: UserCredentials[] = []) {
    super();
    for (const u of users) this.users.set(u.principal.username, u);
  }

  findByUsername(username: string): Promise<UserCredentials | null> {
    return Promise.resolve(this.users.get(username) ?? null);
  }
}
