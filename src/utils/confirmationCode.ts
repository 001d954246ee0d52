import { randomUUID } from 'crypto';
import { AlreadySetError } from '../lib/errors';

export const CONFIRMATION_CODE_LENGTH = 8;
export const MAX_CODE_ATTEMPTS = 5;

export type CodeGenerator = () => string;

export const generateConfirmationCode: CodeGenerator = () =>
  randomUUID().replace(/-/g, '').slice(0, CONFIRMATION_CODE_LENGTH).toUpperCase();

export const normalizeConfirmationCode = (code: string): string => code.trim().toUpperCase();

/**
 * Draw codes until one is free. The unique column still backs this up if
 * two transactions race for the same code.
 */
export const issueUniqueCode = async (
  isTaken: (code: string) => Promise<boolean>,
  generate: CodeGenerator = generateConfirmationCode
): Promise<string> => {
  for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt++) {
    const code = generate();
    if (!(await isTaken(code))) {
      return code;
    }
  }
  throw new AlreadySetError(`Could not issue a unique confirmation code after ${MAX_CODE_ATTEMPTS} attempts`);
};
