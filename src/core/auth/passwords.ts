import bcrypt from 'bcryptjs';

/** bcrypt reads no further than this many bytes of a password. */
export const MAX_PASSWORD_BYTES = 72;

export function passwordBytes(password: string): number {
  return Buffer.byteLength(password, 'utf8');
}

export async function hashPassword(password: string, rounds: number): Promise<string> {
  return bcrypt.hash(password, rounds);
}

/**
 * A password bcrypt would truncate never matches; otherwise one sharing the first 72 bytes of the
 * real one would.
 */
export async function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  if (passwordBytes(password) > MAX_PASSWORD_BYTES) {
    return false;
  }
  return bcrypt.compare(password, passwordHash);
}
