/**
 * TenantStoreRegistry
 *
 * One durable-storage handle per organization, created lazily on first use
 * and cached for the process lifetime. Handle creation is single-flight:
 * concurrent first callers share the same instance and its init runs once.
 */

import { TenantInitFailedError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

// ============================================================================
// Contracts
// ============================================================================

export interface TenantStorage {
  /** Idempotent index/schema setup, safe to repeat */
  init(): Promise<void>;
}

export interface TenantCatalog {
  /** Reachability of the underlying store */
  ping(): Promise<boolean>;
  /** Every namespace (database, schema...) known to the store */
  listNamespaces(): Promise<string[]>;
}

export type TenantStorageFactory<H extends TenantStorage> = (namespace: string) => H;

export interface TenantStoreRegistryOptions<H extends TenantStorage> {
  catalog: TenantCatalog;
  createStorage: TenantStorageFactory<H>;
  /** Namespace prefix identifying this service's tenants */
  prefix?: string;
  /** Organization used when none is given */
  defaultOrganization?: string;
  logger?: Logger;
}

export const DEFAULT_TENANT_PREFIX = 'org-';
export const DEFAULT_ORGANIZATION = 'default';

const ORGANIZATION_PATTERN = /^[A-Za-z0-9_-]{1,48}$/;

// ============================================================================
// TenantStoreRegistry Class
// ============================================================================

export class TenantStoreRegistry<H extends TenantStorage> {
  private readonly catalog: TenantCatalog;
  private readonly createStorage: TenantStorageFactory<H>;
  private readonly logger: Logger;
  private readonly handles: Map<string, H> = new Map();
  private readonly pending: Map<string, Promise<H>> = new Map();
  private closed = false;

  readonly prefix: string;
  readonly defaultOrganization: string;

  constructor(options: TenantStoreRegistryOptions<H>) {
    this.catalog = options.catalog;
    this.createStorage = options.createStorage;
    this.prefix = options.prefix ?? DEFAULT_TENANT_PREFIX;
    this.defaultOrganization = options.defaultOrganization ?? DEFAULT_ORGANIZATION;
    this.logger = (options.logger ?? createLogger('flowrelay')).child({ component: 'tenant-stores' });
  }

  /**
   * Resolve the organization actually used for a possibly missing name.
   */
  resolve(organization?: string | null): string {
    return organization || this.defaultOrganization;
  }

  namespaceOf(organization?: string | null): string {
    const name = this.resolve(organization);
    if (!ORGANIZATION_PATTERN.test(name)) {
      throw new TenantInitFailedError(name, `Invalid organization name: '${name}'`);
    }
    return `${this.prefix}${name}`;
  }

  /**
   * Return the cached handle, or health-check the store and set one up.
   */
  async getOrCreate(organization?: string | null): Promise<H> {
    const name = this.resolve(organization);
    const namespace = this.namespaceOf(name);
    this.assertOpen(name);
    const cached = this.handles.get(namespace);
    if (cached) return cached;

    await this.assertReachable(name);
    return this.create(namespace, name);
  }

  /**
   * Run `fn` with a ready handle. The store is pinged on every entry and the
   * handle's init runs exactly once, on the organization's first use.
   */
  async withTenant<T>(organization: string | null | undefined, fn: (storage: H) => Promise<T>): Promise<T> {
    const name = this.resolve(organization);
    const namespace = this.namespaceOf(name);
    this.assertOpen(name);
    await this.assertReachable(name);

    const storage = this.handles.get(namespace) ?? (await this.create(namespace, name));
    return fn(storage);
  }

  /**
   * Organizations found in the store's catalog, following the prefix convention.
   */
  async listOrganizations(): Promise<string[]> {
    const namespaces = await this.catalog.listNamespaces();
    return namespaces
      .filter((namespace) => namespace.startsWith(this.prefix))
      .map((namespace) => namespace.slice(this.prefix.length));
  }

  /**
   * Organizations with a live handle in this process.
   */
  cached(): string[] {
    return Array.from(this.handles.keys(), (namespace) => namespace.slice(this.prefix.length));
  }

  /**
   * Forget every handle. Creations still in flight finish for their caller
   * but are not cached.
   */
  close(): void {
    this.closed = true;
    this.handles.clear();
    this.pending.clear();
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private create(namespace: string, organization: string): Promise<H> {
    const cached = this.handles.get(namespace);
    if (cached) return Promise.resolve(cached);

    const inflight = this.pending.get(namespace);
    if (inflight) return inflight;

    const creation: Promise<H> = (async () => {
      this.logger.info({ namespace }, 'Setting up tenant storage');
      const storage = this.createStorage(namespace);
      try {
        await storage.init();
      } catch (error) {
        throw new TenantInitFailedError(
          organization,
          `Tenant storage init failed for '${organization}': ${errorMessage(error)}`,
          { cause: error }
        );
      }
      if (!this.closed) {
        this.handles.set(namespace, storage);
      }
      return storage;
    })().finally(() => {
      if (this.pending.get(namespace) === creation) {
        this.pending.delete(namespace);
      }
    });

    this.pending.set(namespace, creation);
    return creation;
  }

  private assertOpen(organization: string): void {
    if (this.closed) {
      throw new TenantInitFailedError(organization, 'Tenant store registry is closed');
    }
  }

  private async assertReachable(organization: string): Promise<void> {
    let reachable: boolean;
    try {
      reachable = await this.catalog.ping();
    } catch (error) {
      throw new TenantInitFailedError(
        organization,
        `Tenant store unreachable: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!reachable) {
      throw new TenantInitFailedError(organization, 'Tenant store unreachable');
    }
  }
}
