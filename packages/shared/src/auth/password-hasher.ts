import { hash, verify } from '@node-rs/argon2';
import { type PasswordHasher } from '@tollgate/domain';

export interface Argon2Options {
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

const DEFAULT_OPTIONS: Argon2Options = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

export class Argon2PasswordHasher implements PasswordHasher {
  // argon2id is the library default
  private readonly options: Argon2Options & { outputLen: number };

  constructor(options: Partial<Argon2Options> = {}) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
      outputLen: 32,
    };
  }

  async hash(password: string): Promise<string> {
    return hash(password, this.options);
  }

  // Cost parameters are read from the digest itself, so older digests keep verifying.
  async verify(password: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, password);
    } catch {
      return false;
    }
  }
}
