import bcrypt from 'bcryptjs';

export const PASSWORD_MIN_LENGTH = 8;

/**
 * Returns every rule the password breaks; an empty list means it is accepted.
 */
export function passwordProblems(password: string, username?: string): string[] {
  const problems: string[] = [];
  if (password.length < PASSWORD_MIN_LENGTH) {
    problems.push(`This password is too short. It must contain at least ${PASSWORD_MIN_LENGTH} characters.`);
  }
  if (/^\d+$/.test(password)) {
    problems.push('This password is entirely numeric.');
  }
  if (username && password.toLowerCase().includes(username.toLowerCase())) {
    problems.push('The password is too similar to the username.');
  }
  return problems;
}

export const hashPassword = (password: string, rounds: number): Promise<string> => bcrypt.hash(password, rounds);

export const verifyPassword = (password: string, hash: string): Promise<boolean> => bcrypt.compare(password, hash);
