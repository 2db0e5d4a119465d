import { config } from '../config/env';
import { KubeAuthenticator } from '../lib/kube-auth';
import { IngressReconciler, apisFromAuthenticator } from '../lib/kubernetes';
import { PostgresStateStore } from '../lib/postgres';
import { isComplete, missingDesiredFields, resolveDesiredState } from '../lib/desired-state';
import { FileStateStore } from '../repositories/file-store';
import { InMemoryRelationRegistry, InMemoryStateStore } from '../repositories/in-memory-store';
import { RelationCache, type StateStore } from '../repositories/state-store';
import type {
  DesiredState,
  OperatorConfig,
  RelationChangedEvent,
  RelationRecord,
  UnitStatus,
} from '../types/ingress';
import {
  InvalidFieldError,
  MissingFieldsError,
  checkRelationPayload,
  pickRelationPayload,
} from '../utils/validation';

export const INGRESS_RELATION_NAME = 'ingress';

interface IngressServiceDeps {
  cache: RelationCache;
  reconciler: IngressReconciler;
  relations: InMemoryRelationRegistry;
  operatorConfig: OperatorConfig;
  defaultNamespace: string;
  isLeader: () => boolean;
}

export class IngressService {
  private readonly cache: RelationCache;
  private readonly reconciler: IngressReconciler;
  private readonly relations: InMemoryRelationRegistry;
  private readonly defaultNamespace: string;
  private readonly isLeader: () => boolean;
  private operatorConfig: OperatorConfig;
  private status: UnitStatus = { name: 'active', message: '' };

  constructor({ cache, reconciler, relations, operatorConfig, defaultNamespace, isLeader }: IngressServiceDeps) {
    this.cache = cache;
    this.reconciler = reconciler;
    this.relations = relations;
    this.operatorConfig = operatorConfig;
    this.defaultNamespace = defaultNamespace;
    this.isLeader = isLeader;
  }

  getStatus(): UnitStatus {
    return { ...this.status };
  }

  getOperatorConfig(): OperatorConfig {
    return { ...this.operatorConfig };
  }

  setOperatorConfig(next: OperatorConfig): void {
    this.operatorConfig = { ...next };
  }

  recordRelation(relation: RelationRecord): RelationRecord {
    return this.relations.upsert(relation);
  }

  forgetRelation(name: string, id: number): boolean {
    return this.relations.remove(name, id);
  }

  desiredState(): DesiredState {
    return resolveDesiredState(this.operatorConfig, this.cache.get(), this.defaultNamespace);
  }

  private block(error: MissingFieldsError | InvalidFieldError): void {
    if (error instanceof MissingFieldsError) {
      console.error(`Missing required data fields for ingress relation: ${error.missingFields.join(', ')}`);
    } else {
      console.error(`Invalid data field for ingress relation: ${error.field}`);
    }
    this.status = { name: 'blocked', message: error.message };
  }

  /**
   * Validate and cache a relation payload. Returns false, with a blocked status set, when required
   * fields are missing or the port is unusable; the cache is then left as it was.
   */
  private async acceptRelationData(data: Record<string, string>): Promise<boolean> {
    const payload = pickRelationPayload(data);
    try {
      checkRelationPayload(payload);
    } catch (error) {
      if (error instanceof MissingFieldsError || error instanceof InvalidFieldError) {
        this.block(error);
        return false;
      }
      throw error;
    }

    await this.cache.set(payload);
    return true;
  }

  async onConfigChanged(): Promise<UnitStatus> {
    // Only the leader mutates the cluster.
    if (!this.isLeader()) {
      this.status = { name: 'active', message: '' };
      return this.getStatus();
    }

    const state = this.desiredState();
    if (!isComplete(state)) {
      this.block(new MissingFieldsError(missingDesiredFields(state)));
      return this.getStatus();
    }

    await this.reconciler.defineService(state);
    await this.reconciler.defineIngress(state);
    const ips = await this.reconciler.reportServiceIps(state);

    this.status = { name: 'active', message: `Ingress with service IP(s): ${ips.join(', ')}` };
    return this.getStatus();
  }

  async onRelationChanged({ relation }: RelationChangedEvent): Promise<UnitStatus> {
    if (!this.isLeader()) {
      return this.getStatus();
    }

    if (!(await this.acceptRelationData(relation.data))) {
      return this.getStatus();
    }

    return this.onConfigChanged();
  }

  /**
   * Re-sync the cache from the live relations after an upgrade. When no ingress relation is live,
   * the persisted payload stays in place until the next relation event.
   */
  async onUpgrade(): Promise<UnitStatus> {
    for (const [name, relations] of this.relations.listByName()) {
      const relation: RelationRecord | undefined = relations[0];
      if (!relation) {
        continue;
      }

      if (relations.length > 1) {
        console.warn(
          `Multiple relations of type "${name}" detected, using only the first one (id: ${relation.id}) for relation data.`
        );
      }

      if (name === INGRESS_RELATION_NAME) {
        await this.acceptRelationData(relation.data);
      }
    }

    return this.getStatus();
  }
}

function createStateStore(): StateStore {
  switch (config.stateBackend) {
    case 'memory':
      return new InMemoryStateStore();
    case 'postgres':
      if (!config.postgresUrl) {
        throw new Error('POSTGRES_URL is required when STATE_BACKEND=postgres');
      }
      return PostgresStateStore.fromUrl(config.postgresUrl, config.controllerId);
    case 'file':
      return new FileStateStore(config.statePath);
  }
}

export async function createIngressService(): Promise<IngressService> {
  const cache = await RelationCache.open(createStateStore());

  const service: IngressService = new IngressService({
    cache,
    reconciler: new IngressReconciler(
      apisFromAuthenticator(
        new KubeAuthenticator({
          kubeConfigText: () => service.getOperatorConfig()['kube-config'],
          kubeconfigWritePath: config.kubeconfigWritePath,
        })
      )
    ),
    relations: new InMemoryRelationRegistry(),
    operatorConfig: config.operator,
    defaultNamespace: config.modelName,
    isLeader: () => config.unitLeader,
  });

  console.info(
    `Ingress controller initialized (state=${config.stateBackend}, model=${config.modelName}, leader=${config.unitLeader})`
  );
  return service;
}
