import { setImmediate as nextTick } from 'timers/promises';

/**
 * Lets pending promise callbacks and event listeners run.
 */
export async function flushEvents(): Promise<void> {
  await nextTick();
  await nextTick();
}

/**
 * Yields to the event loop until `predicate` holds.
 * @throws When it still does not hold after `attempts` turns
 */
export async function waitUntil(
  predicate: () => boolean,
  attempts = 100,
): Promise<void> {
  for (let i = 0; i < attempts; i += 1) {
    if (predicate()) {
      return;
    }
    await nextTick();
  }
  throw new Error('Condition not reached');
}
