import { TENANT_CONSTANTS } from "../config/constants";
import { Registry } from "./types";

const DEFAULT_ORGANIZATION = TENANT_CONSTANTS.DEFAULT_ORGANIZATION;

export type ResolvedTenant = {
  /** The key the registry was found under: the requested one, or "default". */
  organization: string;
  registry: Registry;
  /** True when the requested key was not registered. */
  aliased: boolean;
};

/**
 * Immutable organization -> Registry lookup.
 *
 * "default" always resolves: when no tenant is registered under it, the first
 * loaded tenant is aliased to it, and with no tenants at all it is empty.
 */
export class TenantDirectory {
  private readonly registries: ReadonlyMap<string, Registry>;

  constructor(tenants: Iterable<readonly [string, Registry]>) {
    const registries = new Map<string, Registry>(tenants);

    if (!registries.has(DEFAULT_ORGANIZATION)) {
      const first = registries.values().next();
      registries.set(DEFAULT_ORGANIZATION, first.done ? Registry.empty() : first.value);
    }

    this.registries = registries;
    Object.freeze(this);
  }

  static empty(): TenantDirectory {
    return new TenantDirectory([]);
  }

  has(organization: string): boolean {
    return this.registries.has(organization);
  }

  /** Registered keys in load order, "default" included. */
  organizations(): string[] {
    return Array.from(this.registries.keys());
  }

  resolve(organization: string): ResolvedTenant {
    const registry = this.registries.get(organization);
    if (registry) {
      return { organization, registry, aliased: false };
    }
    return {
      organization: DEFAULT_ORGANIZATION,
      registry: this.defaultRegistry(),
      aliased: true,
    };
  }

  private defaultRegistry(): Registry {
    return this.registries.get(DEFAULT_ORGANIZATION) ?? Registry.empty();
  }
}
