import bcrypt from "bcryptjs";
import { DEFAULT_PASSWORD_HASH_ROUNDS } from "../config";

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
}

export function createBcryptPasswordHasher(rounds = DEFAULT_PASSWORD_HASH_ROUNDS): PasswordHasher {
  return {
    async hash(plaintext) {
      const salt = await bcrypt.genSalt(rounds);
      return bcrypt.hash(plaintext, salt);
    },
    async verify(plaintext, digest) {
      return bcrypt.compare(plaintext, digest);
    }
  };
}
