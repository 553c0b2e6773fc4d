/**
 * WorkflowRuntimeRegistry Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WorkflowRuntimeRegistry } from '../workflow/registry.js';
import { TenantStoreRegistry } from '../tenancy/registry.js';
import { WorkflowEventBus } from '../events.js';
import type { Fault } from '../faults.js';
import type {
  BeginEngineEvent,
  LiveUpdatePayload,
  ProgressEngineEvent,
  TerminalEngineEvent,
} from '../types.js';
import {
  FakeCatalog,
  FakeHistoryStorage,
  RecordingDelivery,
  createTemplateFixture,
  silentLogger,
  type TestSubscriber,
} from './utils/fakes.js';

const AT = new Date('2026-03-01T10:00:00.000Z');

function begin(executionId: string, organization: string | null = 'acme'): BeginEngineEvent {
  return {
    type: 'begin',
    executionId,
    organization,
    timestamp: AT,
    content: { template: createTemplateFixture(), requester: 'flowrelay://api', track: 'nightly' },
  };
}

function progress(executionId: string, taskId: string, organization = 'acme'): ProgressEngineEvent {
  return {
    type: 'progress',
    executionId,
    organization,
    timestamp: AT,
    content: { taskId, status: 'done' },
  };
}

function terminal(
  executionId: string,
  type: 'end' | 'error' = 'end',
  organization = 'acme'
): TerminalEngineEvent {
  return { type, executionId, organization, timestamp: AT };
}

function subscriber(id: string, organization: string): TestSubscriber {
  return { id, organization };
}

describe('WorkflowRuntimeRegistry', () => {
  let catalog: FakeCatalog;
  let storages: Map<string, FakeHistoryStorage>;
  let delivery: RecordingDelivery;
  let faults: Fault[];
  let failInserts: boolean;
  let registry: WorkflowRuntimeRegistry<FakeHistoryStorage, TestSubscriber>;

  beforeEach(() => {
    catalog = new FakeCatalog();
    storages = new Map();
    delivery = new RecordingDelivery();
    faults = [];
    failInserts = false;

    const tenants = new TenantStoreRegistry<FakeHistoryStorage>({
      catalog,
      createStorage: (namespace) => {
        const storage = new FakeHistoryStorage(namespace);
        storage.failInsert = failInserts;
        storages.set(namespace, storage);
        return storage;
      },
      logger: silentLogger,
    });

    registry = new WorkflowRuntimeRegistry({
      tenants,
      delivery,
      logger: silentLogger,
      faults: (fault) => faults.push(fault),
    });
  });

  describe('lifecycle', () => {
    it('tracks an execution from begin to end, then stores and evicts it', async () => {
      const watcher = subscriber('a', 'acme');
      await registry.subscribe('acme', watcher);

      await registry.onEngineEvent(begin('exec-1'));
      expect(registry.get('exec-1')?.state).toBe('begin');

      await registry.onEngineEvent(progress('exec-1', 't1'));
      expect(registry.get('exec-1')?.state).toBe('progress');

      await registry.onEngineEvent(terminal('exec-1'));
      await registry.whenIdle();

      expect(registry.size).toBe(0);
      expect(registry.get('exec-1')).toBeUndefined();

      const stored = storages.get('org-acme')?.reports ?? [];
      expect(stored).toHaveLength(1);
      expect(stored[0]).toMatchObject({
        id: 'exec-1',
        organization: 'acme',
        requester: 'flowrelay://api',
        track: 'nightly',
        state: 'end',
        start: AT,
        end: AT,
      });
      expect(stored[0].tasks[0]).toEqual({
        id: 't1',
        name: 'fetch',
        title: 'Fetch orders',
        config: { source: 'queue-a' },
        status: 'done',
      });

      expect(delivery.to('a').map((payload) => payload.type)).toEqual([
        'snapshot',
        'begin',
        'progress',
        'end',
      ]);
    });

    it('broadcasts begin with the template and the caller fields', async () => {
      const watcher = subscriber('a', 'acme');
      await registry.subscribe('acme', watcher);

      await registry.onEngineEvent(begin('exec-1'));

      const [, payload] = delivery.to('a');
      expect(payload).toEqual({
        type: 'begin',
        organization: 'acme',
        data: { requester: 'flowrelay://api', track: 'nightly' },
        source: { executionId: 'exec-1', templateId: 'tmpl-1', requester: 'flowrelay://api' },
        timestamp: '2026-03-01T10:00:00.000Z',
        template: createTemplateFixture(),
      } satisfies LiveUpdatePayload);
    });

    it('broadcasts the merged task on progress', async () => {
      const watcher = subscriber('a', 'acme');
      await registry.onEngineEvent(begin('exec-1'));
      await registry.subscribe('acme', watcher);

      await registry.onEngineEvent(progress('exec-1', 't2'));

      const payloads = delivery.to('a');
      expect(payloads[1]).toMatchObject({ type: 'progress', data: { id: 't2', status: 'done' } });
    });

    it('stores errored executions with their error state', async () => {
      await registry.onEngineEvent(begin('exec-1'));
      await registry.onEngineEvent(terminal('exec-1', 'error'));
      await registry.whenIdle();

      expect(storages.get('org-acme')?.reports.map((report) => report.state)).toEqual(['error']);
    });

    it('writes exactly once per finished execution', async () => {
      await registry.onEngineEvent(begin('exec-1'));
      await registry.onEngineEvent(terminal('exec-1'));
      await registry.onEngineEvent(terminal('exec-1'));
      await registry.whenIdle();

      expect(storages.get('org-acme')?.reports).toHaveLength(1);
    });

    it('keeps the record registered until its terminal update is delivered', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));
      const deliver = delivery.send.bind(delivery);
      const registeredAtEnd: Array<string | undefined> = [];
      vi.spyOn(delivery, 'send').mockImplementation(async (subscribers, payload) => {
        if (payload.type === 'end') {
          await new Promise<void>((resolve) => setTimeout(resolve, 10));
          registeredAtEnd.push(registry.get('exec-1', 'acme')?.state);
        }
        await deliver(subscribers, payload);
      });

      await registry.onEngineEvent(begin('exec-1'));
      await registry.onEngineEvent(terminal('exec-1'));
      await registry.whenIdle();

      expect(registeredAtEnd).toEqual(['end']);
      expect(registry.size).toBe(0);
      expect(storages.get('org-acme')?.reports).toHaveLength(1);
    });

    it('registers executions whose template holds functions', async () => {
      const event = begin('exec-1');
      event.content.template = createTemplateFixture({
        tasks: [{ id: 't1', name: 'fetch', config: { handler: () => 1 } }],
      });

      await registry.onEngineEvent(event);
      await registry.onEngineEvent(progress('exec-1', 't1'));

      expect(registry.get('exec-1', 'acme')?.state).toBe('progress');
      expect(registry.get('exec-1', 'acme')?.report().template.tasks[0].config).toEqual({
        handler: 'Internal server data: function',
      });
    });

    it('uses the default organization when none is given', async () => {
      await registry.onEngineEvent(begin('exec-1', null));

      expect(registry.get('exec-1')?.organization).toBe('default');
      expect(registry.list('default')).toHaveLength(1);
    });
  });

  describe('unexpected events', () => {
    it('drops events for unknown executions', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));

      await registry.onEngineEvent(progress('ghost', 't1'));
      await registry.onEngineEvent(terminal('ghost'));
      await registry.whenIdle();

      expect(delivery.to('a').map((payload) => payload.type)).toEqual(['snapshot']);
      expect(storages.size).toBe(0);
      expect(faults).toEqual([]);
    });

    it('ignores a second begin for a live execution', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));

      await registry.onEngineEvent(begin('exec-1'));
      await registry.onEngineEvent(progress('exec-1', 't1'));
      await registry.onEngineEvent(begin('exec-1'));

      expect(registry.get('exec-1')?.state).toBe('progress');
      expect(delivery.to('a').map((payload) => payload.type)).toEqual(['snapshot', 'begin', 'progress']);
    });

    it('drops progress arriving after the terminal event', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));

      await registry.onEngineEvent(begin('exec-1'));
      await registry.onEngineEvent(terminal('exec-1'));
      await registry.onEngineEvent(progress('exec-1', 't1'));
      await registry.whenIdle();

      expect(delivery.to('a').map((payload) => payload.type)).toEqual(['snapshot', 'begin', 'end']);
      expect(storages.get('org-acme')?.reports[0].tasks[0]).not.toHaveProperty('status');
    });
  });

  describe('ordering', () => {
    it('handles the events of one execution in arrival order', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));

      const pending = [
        registry.onEngineEvent(begin('exec-1')),
        registry.onEngineEvent(progress('exec-1', 't1')),
        registry.onEngineEvent(progress('exec-1', 't2')),
        registry.onEngineEvent(terminal('exec-1')),
      ];
      await Promise.all(pending);
      await registry.whenIdle();

      expect(delivery.to('a').map((payload) => payload.type)).toEqual([
        'snapshot',
        'begin',
        'progress',
        'progress',
        'end',
      ]);
      const stored = storages.get('org-acme')?.reports ?? [];
      expect(stored[0].tasks.map((task) => task.status)).toEqual(['done', 'done']);
    });
  });

  describe('tenant isolation', () => {
    it('only delivers updates to subscribers of the same organization', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));
      await registry.subscribe('globex', subscriber('g', 'globex'));

      await registry.onEngineEvent(begin('exec-1', 'acme'));
      await registry.onEngineEvent(terminal('exec-1', 'end', 'acme'));
      await registry.whenIdle();

      expect(delivery.to('a')).toHaveLength(3);
      expect(delivery.to('g').map((payload) => payload.type)).toEqual(['snapshot']);
      expect(storages.has('org-globex')).toBe(false);
    });

    it('ignores events stamped with another organization', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));
      await registry.onEngineEvent(begin('exec-1', 'acme'));

      await registry.onEngineEvent(progress('exec-1', 't1', 'globex'));
      await registry.onEngineEvent(terminal('exec-1', 'end', 'globex'));
      await registry.whenIdle();

      expect(registry.get('exec-1', 'acme')?.state).toBe('begin');
      expect(delivery.to('a').map((payload) => payload.type)).toEqual(['snapshot', 'begin']);
      expect(storages.size).toBe(0);
    });

    it('keeps executions sharing an id apart per organization', async () => {
      await registry.onEngineEvent(begin('exec-1', 'acme'));
      await registry.onEngineEvent(begin('exec-1', 'globex'));

      expect(registry.list('globex').map((instance) => instance.id)).toEqual(['exec-1']);

      await registry.onEngineEvent(terminal('exec-1', 'end', 'globex'));
      await registry.whenIdle();

      expect(registry.get('exec-1', 'acme')?.state).toBe('begin');
      expect(registry.get('exec-1', 'globex')).toBeUndefined();
      expect(storages.get('org-globex')?.reports.map((report) => report.organization)).toEqual(['globex']);
      expect(storages.has('org-acme')).toBe(false);
    });

    it('lists executions per organization', async () => {
      await registry.onEngineEvent(begin('exec-1', 'acme'));
      await registry.onEngineEvent(begin('exec-2', 'globex'));

      expect(registry.list('acme').map((instance) => instance.id)).toEqual(['exec-1']);
      expect(registry.list().map((instance) => instance.id)).toEqual(['exec-1', 'exec-2']);
      expect(registry.size).toBe(2);
    });
  });

  describe('subscribers', () => {
    it('sends the running executions as a snapshot on subscribe', async () => {
      await registry.onEngineEvent(begin('exec-1', 'acme'));
      await registry.onEngineEvent(begin('exec-2', 'globex'));

      const workflows = await registry.subscribe('acme', subscriber('a', 'acme'));

      expect(workflows.map((report) => report.id)).toEqual(['exec-1']);
      expect(delivery.to('a')).toEqual([{ type: 'snapshot', organization: 'acme', workflows }]);
    });

    it('stops delivering after unsubscribe', async () => {
      const watcher = subscriber('a', 'acme');
      await registry.subscribe('acme', watcher);
      registry.unsubscribe(watcher);

      await registry.onEngineEvent(begin('exec-1'));

      expect(delivery.to('a')).toHaveLength(1);
      expect(registry.subscriberCount()).toBe(0);
    });

    it('counts subscribers per organization', async () => {
      await registry.subscribe('acme', subscriber('a', 'acme'));
      await registry.subscribe('acme', subscriber('b', 'acme'));
      await registry.subscribe(null, subscriber('d', 'default'));

      expect(registry.subscriberCount('acme')).toBe(2);
      expect(registry.subscriberCount('default')).toBe(1);
      expect(registry.subscriberCount()).toBe(3);
    });
  });

  describe('history write failures', () => {
    it('reports a failed write and still evicts the execution', async () => {
      await registry.onEngineEvent(begin('exec-1'));
      failInserts = true;

      await registry.onEngineEvent(terminal('exec-1'));
      await registry.whenIdle();

      expect(registry.size).toBe(0);
      expect(faults).toHaveLength(1);
      expect(faults[0].message).toBe('Failed to store finished workflow exec-1: insert rejected');
      expect(faults[0].context).toEqual({ executionId: 'exec-1', organization: 'acme' });
    });

    it('reports an unreachable store and still evicts the execution', async () => {
      await registry.onEngineEvent(begin('exec-1'));
      catalog.reachable = false;

      await registry.onEngineEvent(terminal('exec-1'));
      await registry.whenIdle();

      expect(registry.size).toBe(0);
      expect(faults.map((fault) => fault.message)).toEqual([
        'Failed to store finished workflow exec-1: Tenant store unreachable',
      ]);
    });
  });

  describe('event bus', () => {
    it('processes events published on an attached bus', async () => {
      const bus = new WorkflowEventBus();
      registry.attach(bus);

      bus.emitEngineEvent(begin('exec-1'));
      bus.emitEngineEvent(terminal('exec-1'));
      await registry.whenIdle();

      expect(storages.get('org-acme')?.reports.map((report) => report.id)).toEqual(['exec-1']);
    });

    it('stops listening on close', () => {
      const bus = new WorkflowEventBus();
      registry.attach(bus);
      expect(bus.getListenerCount('begin')).toBe(1);

      registry.close();

      expect(bus.getListenerCount('begin')).toBe(0);
      expect(bus.getListenerCount('end')).toBe(0);
    });
  });
});
