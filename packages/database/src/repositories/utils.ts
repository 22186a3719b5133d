import { PersistenceError } from '../errors.js';

export const withPersistence = async <T>(operation: string, run: () => Promise<T>): Promise<T> => {
  try {
    return await run();
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(operation, error);
  }
};

export const toCount = (value: bigint | number | undefined): number =>
  value === undefined ? 0 : Number(value);
