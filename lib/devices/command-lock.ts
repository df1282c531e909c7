/**
 * Command Lock
 * Serializes command/response exchanges on one channel.
 */

export type WithLock = <T>(fn: () => Promise<T>) => Promise<T>;

// Each caller chains onto the previous holder; release happens on every exit path.
export function createCommandLock(): WithLock {
  let commandLock: Promise<void> = Promise.resolve();

  return function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  };
}
