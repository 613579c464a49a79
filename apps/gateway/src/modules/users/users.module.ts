// src/modules/users/users.module.ts
import { Module } from '@nestjs/common';
import { PgUsersRepository, UsersRepository } from './users.repository';
import { DelegatingPasswordVerifier, PasswordVerifier } from './password/password.verifier';

@Module({
  providers: [
    { provide: UsersRepository, useClass: PgUsersRepository },
    { provide: PasswordVerifier, useFactory: () => new DelegatingPasswordVerifier() },
  ],
  exports: [UsersRepository, PasswordVerifier],
})
export class UsersModule {}
