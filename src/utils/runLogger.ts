import { errorMessage } from '../errors.js';

/**
 * Wraps one step of the generate/post flow with timing logs.
 * Records duration on success and the error message on failure, then rethrows.
 */
export async function withRunLog<T>(functionName: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await fn();
    console.log(`[${functionName}] Completed in ${Date.now() - startTime}ms`);
    return result;
  } catch (err) {
    console.error(`[${functionName}] Failed after ${Date.now() - startTime}ms: ${errorMessage(err)}`);
    throw err;
  }
}
