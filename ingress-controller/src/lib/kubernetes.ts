import * as k8s from '@kubernetes/client-node';
import type { CompleteDesiredState } from '../types/ingress';
import type { KubeAuthenticator } from './kube-auth';
import { buildIngress, buildService, ingressResourceName, serviceResourceName } from './resources';

// The slices of CoreV1Api and NetworkingV1Api the reconciler calls.
export interface ServiceApi {
  listNamespacedService(request: { namespace: string }): Promise<k8s.V1ServiceList>;
  createNamespacedService(request: { namespace: string; body: k8s.V1Service }): Promise<k8s.V1Service>;
  replaceNamespacedService(request: { name: string; namespace: string; body: k8s.V1Service }): Promise<k8s.V1Service>;
}

export interface IngressApi {
  listNamespacedIngress(request: { namespace: string }): Promise<k8s.V1IngressList>;
  createNamespacedIngress(request: { namespace: string; body: k8s.V1Ingress }): Promise<k8s.V1Ingress>;
  replaceNamespacedIngress(request: { name: string; namespace: string; body: k8s.V1Ingress }): Promise<k8s.V1Ingress>;
}

export interface KubernetesApis {
  coreApi: ServiceApi;
  networkingApi: IngressApi;
}

export type ApplyOutcome = 'created' | 'updated';

export function apisFromAuthenticator(authenticator: KubeAuthenticator): () => KubernetesApis {
  return () => {
    const { kubeConfig } = authenticator.authenticate();
    return {
      coreApi: kubeConfig.makeApiClient(k8s.CoreV1Api),
      networkingApi: kubeConfig.makeApiClient(k8s.NetworkingV1Api),
    };
  };
}

function findByName<T extends { metadata?: k8s.V1ObjectMeta }>(items: T[] | undefined, name: string): T | undefined {
  return (items || []).find((item) => item.metadata?.name === name);
}

/**
 * Converges the Service and Ingress for one desired state. Each apply lists the namespace, then
 * replaces the resource carrying the deterministic name or creates it when absent. The list and the
 * write are separate calls; a concurrent change in between surfaces as an API error.
 */
export class IngressReconciler {
  private readonly connect: () => KubernetesApis;
  private apis?: KubernetesApis;

  constructor(connect: () => KubernetesApis) {
    this.connect = connect;
  }

  private getApis(): KubernetesApis {
    if (!this.apis) {
      this.apis = this.connect();
    }
    return this.apis;
  }

  async defineService(state: CompleteDesiredState): Promise<ApplyOutcome> {
    const { coreApi } = this.getApis();
    const name = serviceResourceName(state.serviceName);
    const body = buildService(state);

    const services = await coreApi.listNamespacedService({ namespace: state.namespace });
    const existing = findByName(services.items, name);
    if (existing) {
      await coreApi.replaceNamespacedService({
        name,
        namespace: state.namespace,
        body: {
          ...body,
          metadata: {
            ...body.metadata,
            resourceVersion: existing.metadata?.resourceVersion,
          },
        },
      });
      console.info(`Service updated in namespace ${state.namespace} with name ${state.serviceName}`);
      return 'updated';
    }

    await coreApi.createNamespacedService({ namespace: state.namespace, body });
    console.info(`Service created in namespace ${state.namespace} with name ${state.serviceName}`);
    return 'created';
  }

  async defineIngress(state: CompleteDesiredState): Promise<ApplyOutcome> {
    const { networkingApi } = this.getApis();
    const name = ingressResourceName(state.serviceName);
    const body = buildIngress(state);

    const ingresses = await networkingApi.listNamespacedIngress({ namespace: state.namespace });
    const existing = findByName(ingresses.items, name);
    if (existing) {
      await networkingApi.replaceNamespacedIngress({
        name,
        namespace: state.namespace,
        body: {
          ...body,
          metadata: {
            ...body.metadata,
            resourceVersion: existing.metadata?.resourceVersion,
          },
        },
      });
      console.info(`Ingress updated in namespace ${state.namespace} with name ${state.serviceName}`);
      return 'updated';
    }

    await networkingApi.createNamespacedIngress({ namespace: state.namespace, body });
    console.info(`Ingress created in namespace ${state.namespace} with name ${state.serviceName}`);
    return 'created';
  }

  async reportServiceIps(state: CompleteDesiredState): Promise<string[]> {
    const { coreApi } = this.getApis();
    const name = serviceResourceName(state.serviceName);
    const services = await coreApi.listNamespacedService({ namespace: state.namespace });

    return (services.items || [])
      .filter((service) => service.metadata?.name === name)
      .map((service) => service.spec?.clusterIP)
      .filter((ip): ip is string => Boolean(ip));
  }
}
