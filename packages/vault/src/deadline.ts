import { MAX_SWAP_DEADLINE_MS, VaultError } from "./types.js";

/**
 * A swap bound must be a whole number of milliseconds a Node timer can
 * hold: at least 1 and at most MAX_SWAP_DEADLINE_MS.
 */
export function assertDeadlineMs(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_SWAP_DEADLINE_MS) {
    throw new VaultError(
      "INVALID_DEADLINE",
      `${label} must be an integer between 1 and ${String(MAX_SWAP_DEADLINE_MS)}ms, got ${String(value)}`,
      { details: { value: String(value) } },
    );
  }
}

/**
 * Race `work` against a timer. The timer is always cleared, so a
 * finished call leaves nothing pending.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
