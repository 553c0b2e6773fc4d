/**
 * TenantStoreRegistry Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TenantStoreRegistry } from '../tenancy/registry.js';
import { TenantInitFailedError } from '../errors.js';
import { FakeCatalog, FakeHistoryStorage, silentLogger } from './utils/fakes.js';

describe('TenantStoreRegistry', () => {
  let catalog: FakeCatalog;
  let created: FakeHistoryStorage[];
  let registry: TenantStoreRegistry<FakeHistoryStorage>;

  beforeEach(() => {
    catalog = new FakeCatalog();
    created = [];
    registry = new TenantStoreRegistry({
      catalog,
      createStorage: (namespace) => {
        const storage = new FakeHistoryStorage(namespace);
        created.push(storage);
        return storage;
      },
      logger: silentLogger,
    });
  });

  describe('naming', () => {
    it('falls back to the default organization', () => {
      expect(registry.resolve(undefined)).toBe('default');
      expect(registry.resolve(null)).toBe('default');
      expect(registry.resolve('')).toBe('default');
      expect(registry.resolve('acme')).toBe('acme');
    });

    it('prefixes namespaces', () => {
      expect(registry.namespaceOf('acme')).toBe('org-acme');
      expect(registry.namespaceOf(null)).toBe('org-default');
    });

    it('rejects names that cannot be used as a namespace', () => {
      expect(() => registry.namespaceOf('acme"; drop')).toThrow(TenantInitFailedError);
      expect(() => registry.namespaceOf('a'.repeat(49))).toThrow("Invalid organization name");
    });
  });

  describe('getOrCreate', () => {
    it('creates and initializes a handle on first use', async () => {
      const storage = await registry.getOrCreate('acme');

      expect(storage.namespace).toBe('org-acme');
      expect(storage.inits).toBe(1);
      expect(registry.cached()).toEqual(['acme']);
    });

    it('returns the cached handle without pinging again', async () => {
      const first = await registry.getOrCreate('acme');
      const second = await registry.getOrCreate('acme');

      expect(second).toBe(first);
      expect(catalog.pings).toBe(1);
      expect(created).toHaveLength(1);
    });

    it('shares one handle between concurrent first callers', async () => {
      const handles = await Promise.all(
        Array.from({ length: 5 }, () => registry.getOrCreate('acme'))
      );

      for (const handle of handles) {
        expect(handle).toBe(handles[0]);
      }
      expect(created).toHaveLength(1);
      expect(handles[0].inits).toBe(1);
    });

    it('keeps organizations apart', async () => {
      const acme = await registry.getOrCreate('acme');
      const globex = await registry.getOrCreate('globex');

      expect(acme).not.toBe(globex);
      expect(globex.namespace).toBe('org-globex');
    });

    it('fails when the store is unreachable', async () => {
      catalog.reachable = false;

      await expect(registry.getOrCreate('acme')).rejects.toBeInstanceOf(TenantInitFailedError);
      expect(created).toEqual([]);
    });

    it('fails when the health probe throws', async () => {
      vi.spyOn(catalog, 'ping').mockRejectedValueOnce(new Error('connection refused'));

      await expect(registry.getOrCreate('acme')).rejects.toThrow(
        'Tenant store unreachable: connection refused'
      );
    });

    it('does not cache a handle whose init failed', async () => {
      let attempt = 0;
      const createStorage = (namespace: string): FakeHistoryStorage => {
        attempt++;
        const storage = new FakeHistoryStorage(namespace);
        if (attempt === 1) {
          vi.spyOn(storage, 'init').mockRejectedValueOnce(new Error('disk full'));
        }
        return storage;
      };
      const retrying = new TenantStoreRegistry<FakeHistoryStorage>({
        catalog,
        createStorage,
        logger: silentLogger,
      });

      await expect(retrying.getOrCreate('acme')).rejects.toThrow(
        "Tenant storage init failed for 'acme': disk full"
      );
      expect(retrying.cached()).toEqual([]);

      const storage = await retrying.getOrCreate('acme');
      expect(storage.inits).toBe(1);
      expect(attempt).toBe(2);
      expect(retrying.cached()).toEqual(['acme']);
    });
  });

  describe('withTenant', () => {
    it('pings the store on every call but initializes once', async () => {
      await registry.withTenant('acme', async () => undefined);
      await registry.withTenant('acme', async () => undefined);
      await registry.withTenant('acme', async () => undefined);

      expect(catalog.pings).toBe(3);
      expect(created).toHaveLength(1);
      expect(created[0].inits).toBe(1);
    });

    it('passes the handle and returns the callback result', async () => {
      const namespace = await registry.withTenant(null, async (storage) => storage.namespace);

      expect(namespace).toBe('org-default');
    });

    it('refuses to run when the store is down, even with a cached handle', async () => {
      await registry.getOrCreate('acme');
      catalog.reachable = false;
      const fn = vi.fn(async () => 'never');

      await expect(registry.withTenant('acme', fn)).rejects.toBeInstanceOf(TenantInitFailedError);
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe('listOrganizations', () => {
    it('only lists namespaces carrying the prefix, without it', async () => {
      catalog.namespaces = ['org-acme', 'public', 'org-globex', 'organization', 'pg_catalog'];

      expect(await registry.listOrganizations()).toEqual(['acme', 'globex']);
    });

    it('honours a custom prefix', async () => {
      const custom = new TenantStoreRegistry<FakeHistoryStorage>({
        catalog,
        createStorage: (namespace) => new FakeHistoryStorage(namespace),
        prefix: 'tenant_',
        logger: silentLogger,
      });
      catalog.namespaces = ['tenant_acme', 'org-globex'];

      expect(await custom.listOrganizations()).toEqual(['acme']);
      expect(custom.namespaceOf('acme')).toBe('tenant_acme');
    });
  });

  it('forgets cached handles on close', async () => {
    await registry.getOrCreate('acme');
    registry.close();

    expect(registry.cached()).toEqual([]);
  });

  it('does not cache a handle whose init finishes after close', async () => {
    const creation = registry.getOrCreate('acme');
    registry.close();

    const storage = await creation;

    expect(storage).toBe(created[0]);
    expect(storage.inits).toBe(1);
    expect(registry.cached()).toEqual([]);
  });

  it('refuses new handles once closed', async () => {
    registry.close();

    await expect(registry.getOrCreate('acme')).rejects.toThrow('Tenant store registry is closed');
    await expect(registry.withTenant('acme', async () => 'never')).rejects.toBeInstanceOf(TenantInitFailedError);
    expect(created).toEqual([]);
  });
});
