/**
 * One-way password hashing. The repository layer never stores or logs
 * plain passwords.
 */
export interface PasswordHasher {
  hash(password: string): Promise<string>;

  /**
   * @returns true when `password` produced `hashed`
   */
  verify(password: string, hashed: string): Promise<boolean>;
}
