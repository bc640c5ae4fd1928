/** Let `count` microtask turns run. */
export async function flushMicrotasks(count = 10): Promise<void> {
  for (let i = 0; i < count; i++) {
    await Promise.resolve();
  }
}

/** Let every queued microtask and pending I/O callback run. */
export function flushAsync(): Promise<void> {
  return new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
}
