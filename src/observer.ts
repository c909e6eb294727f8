/**
 * Resource Observer
 *
 * Fetches the current configuration of a resource through its provider and
 * freezes it into a snapshot. Transient provider errors are retried with
 * backoff; anything else, or retries running out, surfaces as an
 * `ObservationError`.
 */

import { ObservationError, formatErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { ProviderRegistry } from "./providers/registry.js";
import type { RawResource } from "./providers/types.js";
import {
  getRetryAfterMs,
  isoNow,
  isTransientError,
  retryAsync,
  systemClock,
  type Clock,
  type RetryConfig,
} from "./retry.js";
import type { ResourceRef, ResourceSnapshot } from "./types.js";

export type ObserverOptions = {
  retry?: RetryConfig;
  clock?: Clock;
  logger?: Logger;
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function createSnapshot(ref: ResourceRef, raw: RawResource, capturedAt: string): ResourceSnapshot {
  return deepFreeze({
    ref: { ...ref },
    ...(raw.name !== undefined ? { name: raw.name } : {}),
    ...(raw.arn !== undefined ? { arn: raw.arn } : {}),
    attributes: structuredClone(raw.attributes),
    capturedAt,
  });
}

export class ResourceObserver {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly providers: ProviderRegistry,
    private readonly options: ObserverOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async observe(ref: ResourceRef): Promise<ResourceSnapshot> {
    const provider = this.providers.forType(ref.resourceType);
    if (!provider) {
      throw new ObservationError(`No provider for resource type ${ref.resourceType}`, "unsupported", ref);
    }

    let raw: RawResource;
    try {
      raw = await retryAsync(() => provider.fetch(ref), {
        ...this.options.retry,
        label: `observe ${ref.resourceType}/${ref.resourceId}`,
        clock: this.clock,
        shouldRetry: (err) => !(err instanceof ObservationError) && isTransientError(err),
        retryAfterMs: getRetryAfterMs,
        onRetry: (info) =>
          this.logger.debug(
            `${info.label}: attempt ${info.attempt}/${info.maxAttempts} failed (${formatErrorMessage(info.err)}), retrying in ${info.delayMs}ms`,
          ),
      });
    } catch (err) {
      if (err instanceof ObservationError) throw err;
      const failure = isTransientError(err) ? "unreachable" : "rejected";
      throw new ObservationError(
        `Cannot observe ${ref.resourceType}/${ref.resourceId}: ${formatErrorMessage(err)}`,
        failure,
        ref,
        { cause: err },
      );
    }

    return createSnapshot(ref, raw, isoNow(this.clock));
  }
}
