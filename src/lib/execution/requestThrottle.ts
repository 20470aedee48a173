/**
 * RequestThrottle: spaces call starts per service at 1000 / requestsPerSecond ms.
 * Slots are reserved synchronously, so concurrent callers queue behind each other
 * instead of all waking at once. A missing or zero rate means unthrottled.
 */

import { createLogger } from "../../utils/log.js";

const log = createLogger("RequestThrottle");

export interface RequestThrottleOptions {
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export class RequestThrottle {
  private readonly nextSlotAt = new Map<string, number>();

  constructor(
    private readonly requestsPerSecond: Readonly<Partial<Record<string, number>>>,
    private readonly options: RequestThrottleOptions
  ) {}

  intervalFor(service: string): number {
    const rps = this.requestsPerSecond[service] ?? 0;
    return rps > 0 ? 1000 / rps : 0;
  }

  /** Waits for the service's next slot. Resolves with the time waited. */
  async acquire(service: string): Promise<number> {
    const interval = this.intervalFor(service);
    if (interval === 0) return 0;
    const now = this.options.now();
    const slot = Math.max(now, this.nextSlotAt.get(service) ?? now);
    this.nextSlotAt.set(service, slot + interval);
    const wait = slot - now;
    if (wait > 0) {
      log.debug(`${service}: waiting ${Math.round(wait)}ms for the next request slot`);
      await this.options.sleep(wait);
    }
    return wait;
  }
}
