export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

export function captureThrow(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

export function narrow<T>(value: unknown, ctor: new (...args: never[]) => T): T {
  if (!(value instanceof ctor)) {
    throw new Error(`Expected an instance of ${ctor.name}, got ${String(value)}`);
  }
  return value;
}
