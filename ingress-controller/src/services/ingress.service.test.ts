import { beforeEach, describe, expect, it, vi } from 'vitest';
import { IngressReconciler } from '../lib/kubernetes';
import { InMemoryRelationRegistry, InMemoryStateStore } from '../repositories/in-memory-store';
import { RelationCache } from '../repositories/state-store';
import { FakeCluster } from '../testing/fake-cluster';
import type { OperatorConfig, RelationPayload, RelationRecord } from '../types/ingress';
import { IngressService } from './ingress.service';

interface SetupOptions {
  operatorConfig?: OperatorConfig;
  cached?: RelationPayload;
  leader?: boolean;
}

async function setup({ operatorConfig = {}, cached = {}, leader = true }: SetupOptions = {}) {
  const cluster = new FakeCluster();
  const store = new InMemoryStateStore(cached);
  const relations = new InMemoryRelationRegistry();
  const service = new IngressService({
    cache: await RelationCache.open(store),
    reconciler: new IngressReconciler(() => cluster.apis()),
    relations,
    operatorConfig,
    defaultNamespace: 'model',
    isLeader: () => leader,
  });
  return { cluster, store, relations, service };
}

function ingressRelation(data: Record<string, string>, id = 1): RelationRecord {
  return { name: 'ingress', id, app: 'web', data };
}

const webConfig: OperatorConfig = {
  'service-name': 'web',
  'service-hostname': 'web.example.com',
  'service-port': 8080,
};

const webRelationData = {
  'service-hostname': 'web.example.com',
  'service-name': 'web',
  'service-port': '8080',
  'ingress-address': '10.1.2.3',
};

describe('IngressService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  describe('onConfigChanged', () => {
    it('creates the service and ingress and reports the service IP', async () => {
      const { cluster, service } = await setup({ operatorConfig: webConfig });

      await expect(service.onConfigChanged()).resolves.toEqual({
        name: 'active',
        message: 'Ingress with service IP(s): 10.152.183.10',
      });

      const created = cluster.services.get('model/web-service');
      expect(created?.spec?.ports).toEqual([{ name: 'tcp-8080', port: 8080, targetPort: 8080 }]);

      const ingress = cluster.ingresses.get('model/web-ingress');
      expect(ingress?.spec?.rules?.[0]?.host).toBe('web.example.com');
      expect(ingress?.spec?.rules?.[0]?.http?.paths).toEqual([
        {
          path: '/',
          pathType: 'Prefix',
          backend: { service: { name: 'web-service', port: { number: 8080 } } },
        },
      ]);
      expect(ingress?.metadata?.annotations).toEqual({
        'nginx.ingress.kubernetes.io/rewrite-target': '/',
        'nginx.ingress.kubernetes.io/ssl-redirect': 'false',
      });
    });

    it('adds the affinity annotations for a session cookie max age', async () => {
      const { cluster, service } = await setup({
        operatorConfig: { ...webConfig, 'session-cookie-max-age': '3600' },
      });

      await service.onConfigChanged();

      const annotations = cluster.ingresses.get('model/web-ingress')?.metadata?.annotations;
      expect(annotations?.['nginx.ingress.kubernetes.io/session-cookie-name']).toBe('WEB_AFFINITY');
      expect(Object.keys(annotations ?? {})).toHaveLength(8);
    });

    it('issues only updates once the cluster has converged', async () => {
      const { cluster, service } = await setup({ operatorConfig: webConfig });

      await service.onConfigChanged();
      const firstIngress = cluster.ingresses.get('model/web-ingress');
      cluster.calls.length = 0;
      await service.onConfigChanged();

      expect(cluster.mutations()).toEqual(['replace service model/web-service', 'replace ingress model/web-ingress']);
      expect(cluster.ingresses.get('model/web-ingress')?.spec).toEqual(firstIngress?.spec);
      expect(service.getStatus().message).toBe('Ingress with service IP(s): 10.152.183.10');
    });

    it('leaves the cluster alone on a non-leader', async () => {
      const { cluster, service } = await setup({ operatorConfig: webConfig, leader: false });

      await expect(service.onConfigChanged()).resolves.toEqual({ name: 'active', message: '' });
      expect(cluster.calls).toEqual([]);
    });

    it('blocks without touching the cluster when required fields are missing', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const { cluster, service } = await setup({ operatorConfig: { 'service-name': 'web' } });

      await expect(service.onConfigChanged()).resolves.toEqual({
        name: 'blocked',
        message: 'Missing fields for ingress: service-hostname, service-port',
      });
      expect(cluster.calls).toEqual([]);
      expect(error).toHaveBeenCalledWith(
        'Missing required data fields for ingress relation: service-hostname, service-port'
      );
    });

    it('lets configuration override relation data', async () => {
      const { cluster, service } = await setup({
        operatorConfig: { 'service-hostname': 'override.example.com' },
        cached: { 'service-hostname': 'web.example.com', 'service-name': 'web', 'service-port': '8080' },
      });

      await service.onConfigChanged();

      expect(cluster.ingresses.get('model/web-ingress')?.spec?.rules?.[0]?.host).toBe('override.example.com');
    });

    it('propagates cluster errors and keeps the last status', async () => {
      const { cluster, service } = await setup({ operatorConfig: webConfig });
      cluster.networkingApi.listNamespacedIngress = async () => {
        throw new Error('Unauthorized');
      };

      await expect(service.onConfigChanged()).rejects.toThrow('Unauthorized');
      expect(service.getStatus()).toEqual({ name: 'active', message: '' });
    });
  });

  describe('onRelationChanged', () => {
    it('caches the ingress fields and reconciles from them', async () => {
      const { cluster, store, service } = await setup();

      const status = await service.onRelationChanged({ relation: ingressRelation(webRelationData) });

      expect(status.name).toBe('active');
      await expect(store.load()).resolves.toEqual({
        'service-hostname': 'web.example.com',
        'service-name': 'web',
        'service-port': '8080',
      });
      expect(cluster.services.has('model/web-service')).toBe(true);
      expect(cluster.ingresses.has('model/web-ingress')).toBe(true);
    });

    it('uses the namespace the relation asks for', async () => {
      const { cluster, service } = await setup();

      await service.onRelationChanged({
        relation: ingressRelation({ ...webRelationData, 'service-namespace': 'web-ns' }),
      });

      expect(cluster.services.has('web-ns/web-service')).toBe(true);
    });

    it('blocks and keeps the cached payload when required fields are missing', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const cached = { 'service-hostname': 'web.example.com', 'service-name': 'web', 'service-port': '8080' };
      const { cluster, store, service } = await setup({ cached });

      const status = await service.onRelationChanged({ relation: ingressRelation({ 'service-name': 'api' }) });

      expect(status).toEqual({ name: 'blocked', message: 'Missing fields for ingress: service-hostname, service-port' });
      await expect(store.load()).resolves.toEqual(cached);
      expect(service.desiredState().serviceName).toBe('web');
      expect(cluster.calls).toEqual([]);
    });

    it.each(['http', '0', '70000'])('blocks and keeps the cached payload for service-port %j', async (port) => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const cached = { 'service-hostname': 'web.example.com', 'service-name': 'web', 'service-port': '8080' };
      const { cluster, store, service } = await setup({ cached });

      const status = await service.onRelationChanged({
        relation: ingressRelation({ ...webRelationData, 'service-name': 'api', 'service-port': port }),
      });

      expect(status).toEqual({
        name: 'blocked',
        message: `Invalid service-port for ingress: "${port}" is not a port between 1 and 65535`,
      });
      expect(error).toHaveBeenCalledWith('Invalid data field for ingress relation: service-port');
      await expect(store.load()).resolves.toEqual(cached);
      expect(service.desiredState().servicePort).toBe(8080);
      expect(cluster.calls).toEqual([]);
    });

    it('is ignored by non-leaders', async () => {
      const { cluster, store, service } = await setup({ leader: false });

      await service.onRelationChanged({ relation: ingressRelation(webRelationData) });

      await expect(store.load()).resolves.toEqual({});
      expect(cluster.calls).toEqual([]);
    });
  });

  describe('onUpgrade', () => {
    const cached = {
      'service-hostname': 'web.example.com',
      'service-name': 'web',
      'service-port': '8080',
      'max-body-size': '20',
      'tls-secret-name': 'web-tls',
    };

    it('reproduces the cached desired state without a relation event', async () => {
      const { store } = await setup({ cached });
      const { service } = await setup({ cached: await store.load() });

      await service.onUpgrade();

      expect(service.desiredState()).toEqual({
        serviceHostname: 'web.example.com',
        serviceName: 'web',
        servicePort: 8080,
        namespace: 'model',
        maxBodySize: '20m',
        tlsSecretName: 'web-tls',
      });
    });

    it('re-syncs from the first live ingress relation and warns about the rest', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const { store, relations, service } = await setup({ cached });
      relations.upsert(ingressRelation({ ...webRelationData, 'service-name': 'web-v2' }, 3));
      relations.upsert(ingressRelation({ ...webRelationData, 'service-name': 'other' }, 5));

      await service.onUpgrade();

      await expect(store.load()).resolves.toEqual({
        'service-hostname': 'web.example.com',
        'service-name': 'web-v2',
        'service-port': '8080',
      });
      expect(warn).toHaveBeenCalledWith(
        'Multiple relations of type "ingress" detected, using only the first one (id: 3) for relation data.'
      );
    });

    it('ignores relations of other names', async () => {
      const { store, relations, service } = await setup({ cached });
      relations.upsert({ name: 'metrics', id: 9, app: 'prometheus', data: { 'service-name': 'prometheus' } });

      await service.onUpgrade();

      await expect(store.load()).resolves.toEqual(cached);
    });
  });
});
