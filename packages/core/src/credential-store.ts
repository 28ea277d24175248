import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'node:crypto';
import {
  AuthenticationError,
  UserExistsError,
  ValidationError,
  isoNow,
  type UserIdentity,
  type UserSummary,
} from '@insights/shared';
import type { UserRepository } from '@insights/store';

const SALT_BYTES = 16;
const KEY_BYTES = 32;
const DIGEST = 'sha256';

export const DEFAULT_PASSWORD_ITERATIONS = 200_000;

/**
 * Username/password identities backed by the long-term store.
 * Passwords are never stored; only a per-user random salt and the
 * PBKDF2-HMAC-SHA256 digest, both base64-encoded.
 */
export class CredentialStore {
  constructor(
    private users: UserRepository,
    private iterations: number = DEFAULT_PASSWORD_ITERATIONS,
  ) {
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new ValidationError(`Password iterations must be a positive integer, got ${iterations}`);
    }
  }

  /**
   * Return the id for a known username with the right password, or create
   * the identity when the username is new. A wrong password for an existing
   * username throws AuthenticationError; no second identity is created.
   */
  provisionOrAuthenticate(username: string, password: string): number {
    const name = normalizeUsername(username);
    const existing = this.users.getByUsername(name);
    if (existing) {
      if (this.matches(existing, password)) return existing.id;
      throw new AuthenticationError(name);
    }

    try {
      return this.create(name, password);
    } catch (err) {
      if (!(err instanceof UserExistsError)) throw err;
      // Another process provisioned the same name between our read and insert.
      const id = this.authenticate(name, password);
      if (id === null) throw new AuthenticationError(name);
      return id;
    }
  }

  /** Id on a correct password, null for an unknown user or a mismatch. */
  authenticate(username: string, password: string): number | null {
    const name = username.trim();
    if (!name) return null;
    const user = this.users.getByUsername(name);
    if (!user) return null;
    return this.matches(user, password) ? user.id : null;
  }

  register(username: string, password: string): number {
    const name = normalizeUsername(username);
    if (this.users.getByUsername(name)) {
      throw new UserExistsError(name);
    }
    return this.create(name, password);
  }

  listUsers(): UserSummary[] {
    return this.users.list();
  }

  private create(username: string, password: string): number {
    const salt = randomBytes(SALT_BYTES);
    const hash = this.derive(password, salt);
    try {
      return this.users.insert({
        username,
        passwordSalt: salt.toString('base64'),
        passwordHash: hash.toString('base64'),
        createdAt: isoNow(),
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new UserExistsError(username);
      throw err;
    }
  }

  private matches(user: UserIdentity, password: string): boolean {
    const salt = Buffer.from(user.passwordSalt, 'base64');
    const expected = Buffer.from(user.passwordHash, 'base64');
    const actual = this.derive(password, salt);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  private derive(password: string, salt: Buffer): Buffer {
    return pbkdf2Sync(password, salt, this.iterations, KEY_BYTES, DIGEST);
  }
}

function normalizeUsername(username: string): string {
  const name = username.trim();
  if (!name) throw new ValidationError('Username must not be empty');
  return name;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}
