import type { RuntimeEvent, RuntimeEventHandler } from "@apphost/sdk";

const SEGMENT = /^(\*|[A-Za-z][A-Za-z0-9]*)$/;

interface Subscription {
  readonly segments: readonly string[];
  readonly handler: RuntimeEventHandler;
}

/**
 * Lifecycle events of one application model, named `Subject.Action`. A `*`
 * pattern segment matches any single segment; a lone `*` matches every event.
 */
export class EventBus {
  private readonly subscriptions: Subscription[] = [];

  on(pattern: string, handler: RuntimeEventHandler): void {
    const segments = pattern.split(".");
    if (!segments.every((segment) => SEGMENT.test(segment))) {
      throw new Error(`Invalid event name "${pattern}". Expected dotted segments such as "Resource.Added".`);
    }
    this.subscriptions.push({ segments, handler });
  }

  /** Calls matching handlers in subscription order. */
  emit(name: string, payload?: Record<string, unknown>): void {
    const event: RuntimeEvent = { name, payload };
    const segments = name.split(".");
    for (const subscription of this.subscriptions) {
      if (matches(subscription.segments, segments)) {
        subscription.handler(event);
      }
    }
  }
}

function matches(pattern: readonly string[], event: readonly string[]): boolean {
  if (pattern.length === 1 && pattern[0] === "*") {
    return true;
  }
  return pattern.length === event.length && pattern.every((part, i) => part === "*" || part === event[i]);
}
