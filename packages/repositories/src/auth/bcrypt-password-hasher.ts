import { compare, hash } from 'bcryptjs';
import type { PasswordHasher } from '../interfaces/index.js';

export const DEFAULT_BCRYPT_ROUNDS = 12;

/**
 * PasswordHasher backed by bcryptjs
 */
export function createBcryptPasswordHasher(rounds = DEFAULT_BCRYPT_ROUNDS): PasswordHasher {
  return {
    hash: (password) => hash(password, rounds),
    verify: (password, hashed) => compare(password, hashed),
  };
}
