export * from './auth/auth.zod';
