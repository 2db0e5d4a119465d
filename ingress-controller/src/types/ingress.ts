export const REQUIRED_INGRESS_RELATION_FIELDS = ['service-hostname', 'service-name', 'service-port'] as const;

export const OPTIONAL_INGRESS_RELATION_FIELDS = [
  'max-body-size',
  'service-namespace',
  'session-cookie-max-age',
  'tls-secret-name',
] as const;

export type RequiredIngressField = (typeof REQUIRED_INGRESS_RELATION_FIELDS)[number];
export type OptionalIngressField = (typeof OPTIONAL_INGRESS_RELATION_FIELDS)[number];
export type IngressField = RequiredIngressField | OptionalIngressField;

// The known ingress fields of the peer's relation data; any of them may be missing.
export type RelationPayload = Partial<Record<IngressField, string>>;

export interface OperatorConfig {
  'service-hostname'?: string;
  'service-name'?: string;
  'service-port'?: number;
  'service-namespace'?: string;
  'max-body-size'?: string;
  'session-cookie-max-age'?: string;
  'tls-secret-name'?: string;
  'kube-config'?: string;
}

export interface DesiredState {
  serviceHostname?: string;
  serviceName?: string;
  servicePort?: number;
  namespace: string;
  // Already carries the size unit, e.g. "20m".
  maxBodySize?: string;
  sessionCookieMaxAge?: string;
  tlsSecretName?: string;
}

export interface CompleteDesiredState extends DesiredState {
  serviceHostname: string;
  serviceName: string;
  servicePort: number;
}

export type UnitStatusName = 'active' | 'blocked';

export interface UnitStatus {
  name: UnitStatusName;
  message: string;
}

export interface RelationRecord {
  name: string;
  id: number;
  app: string;
  data: Record<string, string>;
}

export interface RelationChangedEvent {
  relation: RelationRecord;
}
