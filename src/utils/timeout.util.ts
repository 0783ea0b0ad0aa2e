// src/utils/timeout.util.ts
import { ImageError } from './imageError.util.js';

/**
 * Races `work` against a timer. The underlying operation is not cancelled;
 * the caller just stops waiting and gets a TIMEOUT error.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new ImageError('TIMEOUT', `${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
