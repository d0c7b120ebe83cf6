export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(action: () => Promise<T>): Promise<T> {
    const next = this.tail.then(action);
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
