import { createHash } from 'crypto';

export function payloadKey(payload: unknown): string {
  return createHash('sha256')
    .update(JSON.stringify(payload) ?? '')
    .digest('hex');
}

/**
 * Collapses identical in-flight submissions of one action: a second call with
 * the same payload while the first is running gets the first call's promise.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(private readonly action: string) {}

  get size(): number {
    return this.inFlight.size;
  }

  run(payload: unknown, fn: () => Promise<T>): Promise<T> {
    const key = payloadKey(payload);
    const existing = this.inFlight.get(key);
    if (existing) {
      console.log(`[dedupe] ${this.action}: joining request already in flight`);
      return existing;
    }
    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }
}
