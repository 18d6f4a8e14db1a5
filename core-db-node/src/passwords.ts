import bcrypt from "bcryptjs";

export const SALT_ROUNDS = 10;

export function hashPassword(
  password: string,
  rounds: number = SALT_ROUNDS
): Promise<string> {
  return bcrypt.hash(password, rounds);
}
