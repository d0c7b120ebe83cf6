export class OperationTimeoutError extends Error {
  readonly kind = "OperationTimeout";
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`OPERATION_TIMEOUT ${label} exceeded ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
