import { ConfigError, ObservationError } from "../errors.js";
import type { ResourceRef } from "../types.js";
import type { ResourceProvider } from "./types.js";

/**
 * Resource type → provider lookup. Each type is owned by exactly one
 * provider.
 */
export class ProviderRegistry {
  private readonly byType = new Map<string, ResourceProvider>();
  private readonly providers: ResourceProvider[] = [];

  constructor(providers: ResourceProvider[] = []) {
    for (const p of providers) this.register(p);
  }

  register(provider: ResourceProvider): void {
    for (const type of provider.resourceTypes) {
      const existing = this.byType.get(type);
      if (existing) {
        throw new ConfigError(`Resource type ${type} is served by both ${existing.name} and ${provider.name}`);
      }
      this.byType.set(type, provider);
    }
    this.providers.push(provider);
  }

  forType(resourceType: string): ResourceProvider | undefined {
    return this.byType.get(resourceType);
  }

  canonicalize(ref: ResourceRef): ResourceRef {
    return this.forType(ref.resourceType)?.canonicalize?.(ref) ?? ref;
  }

  get resourceTypes(): string[] {
    return [...this.byType.keys()];
  }

  /**
   * Resolve `<ResourceType>/<id>` or a bare id recognized by a provider.
   * Throws `ObservationError` ("unsupported") when nothing matches.
   */
  resolve(input: string, defaults: Pick<ResourceRef, "region" | "accountId"> = {}): ResourceRef {
    const slash = input.indexOf("/");
    if (slash > 0 && input.slice(0, slash).includes("::")) {
      const resourceType = input.slice(0, slash);
      const resourceId = input.slice(slash + 1);
      return { resourceType, resourceId, ...defaults };
    }

    for (const provider of this.providers) {
      const ref = provider.resolve?.(input);
      if (ref) return { ...defaults, ...ref };
    }
    throw new ObservationError(
      `Cannot resolve resource "${input}"; use <ResourceType>/<id>`,
      "unsupported",
      { resourceType: "unknown", resourceId: input, ...defaults },
    );
  }
}
