/**
 * Command lock
 * Serializes bus transactions: a GPIB bus carries one conversation at a time,
 * and an interleaved write/read pair from two callers corrupts both.
 */

export type CommandLock = <T>(fn: () => Promise<T>) => Promise<T>;

export function createCommandLock(): CommandLock {
  let commandLock: Promise<void> = Promise.resolve();

  // Acquire lock for exclusive command access
  return function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  };
}
