/**
 * One command/response exchange at a time per connection. A rejected or
 * failed exchange does not block the ones queued behind it.
 */
export type CommandLock = <T>(exchange: () => Promise<T>) => Promise<T>;

export function createCommandLock(): CommandLock {
  let tail: Promise<void> = Promise.resolve();

  return <T>(exchange: () => Promise<T>): Promise<T> => {
    const run = tail.then(exchange);
    tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };
}
