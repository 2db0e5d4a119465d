import dotenv from 'dotenv';
import type { OperatorConfig } from '../types/ingress';
import { operatorConfigSchema, parseOrThrow } from '../utils/validation';

dotenv.config();

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export const STATE_BACKENDS = ['file', 'memory', 'postgres'] as const;
export type StateBackend = (typeof STATE_BACKENDS)[number];

function readStateBackend(value: string | undefined): StateBackend {
  if (!value) {
    return 'file';
  }

  const normalized = value.trim().toLowerCase();
  const match = STATE_BACKENDS.find((backend) => backend === normalized);
  return match ?? 'file';
}

export function readOperatorConfig(env: NodeJS.ProcessEnv): OperatorConfig {
  return parseOrThrow(operatorConfigSchema, {
    'service-hostname': env.INGRESS_SERVICE_HOSTNAME,
    'service-name': env.INGRESS_SERVICE_NAME,
    'service-port': env.INGRESS_SERVICE_PORT,
    'service-namespace': env.INGRESS_SERVICE_NAMESPACE,
    'max-body-size': env.INGRESS_MAX_BODY_SIZE,
    'session-cookie-max-age': env.INGRESS_SESSION_COOKIE_MAX_AGE,
    'tls-secret-name': env.INGRESS_TLS_SECRET_NAME,
    'kube-config': env.INGRESS_KUBE_CONFIG,
  });
}

export interface Config {
  host: string;
  port: number;
  eventTokens: Set<string>;
  modelName: string;
  controllerId: string;
  unitLeader: boolean;
  stateBackend: StateBackend;
  statePath: string;
  postgresUrl: string;
  kubeconfigWritePath: string;
  operator: OperatorConfig;
}

export const config: Config = {
  host: process.env.CONTROLLER_HOST || '0.0.0.0',
  port: readNumber(process.env.CONTROLLER_PORT, 8080),
  eventTokens: new Set(
    (process.env.EVENT_TOKENS || '')
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean)
  ),
  modelName: process.env.MODEL_NAME || 'default',
  controllerId: process.env.CONTROLLER_ID || 'ingress',
  unitLeader: readBoolean(process.env.UNIT_LEADER, true),
  stateBackend: readStateBackend(process.env.STATE_BACKEND),
  statePath: process.env.STATE_PATH || '.ingress-controller/state.json',
  postgresUrl: process.env.POSTGRES_URL || '',
  kubeconfigWritePath: process.env.K8S_KUBECONFIG_WRITE_PATH || '/kube-config',
  operator: readOperatorConfig(process.env),
};
