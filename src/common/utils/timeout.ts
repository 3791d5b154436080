import { formatDuration } from '@common/utils/duration';

/**
 * Settle with `promise`, or reject once `timeoutMs` has passed. The underlying
 * operation is not cancelled.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${formatDuration(timeoutMs)}`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
