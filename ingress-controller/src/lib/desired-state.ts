import type {
  CompleteDesiredState,
  DesiredState,
  OperatorConfig,
  RelationPayload,
  RequiredIngressField,
} from '../types/ingress';
import { findMissingFields, parsePortText } from '../utils/validation';

function pick(configured: string | undefined, cached: string | undefined): string | undefined {
  return configured || cached || undefined;
}

// "0" and "" both mean "unset" for the numeric annotations, in either source.
function positiveNumericText(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }

  return Number(value) ? value : undefined;
}

function readPort(configured: number | undefined, cached: string | undefined): number | undefined {
  if (configured) {
    return configured;
  }

  return parsePortText(cached);
}

/**
 * Merge operator configuration over the cached relation payload. Configuration wins whenever it
 * carries a non-empty value; the namespace finally falls back to the controller's own model.
 */
export function resolveDesiredState(
  operator: OperatorConfig,
  cached: RelationPayload,
  defaultNamespace: string
): DesiredState {
  const maxBodySize = pick(
    positiveNumericText(operator['max-body-size']),
    positiveNumericText(cached['max-body-size'])
  );

  return {
    serviceHostname: pick(operator['service-hostname'], cached['service-hostname']),
    serviceName: pick(operator['service-name'], cached['service-name']),
    servicePort: readPort(operator['service-port'], cached['service-port']),
    namespace: pick(operator['service-namespace'], cached['service-namespace']) || defaultNamespace,
    maxBodySize: maxBodySize ? `${maxBodySize}m` : undefined,
    sessionCookieMaxAge: pick(
      positiveNumericText(operator['session-cookie-max-age']),
      positiveNumericText(cached['session-cookie-max-age'])
    ),
    tlsSecretName: pick(operator['tls-secret-name'], cached['tls-secret-name']),
  };
}

export function missingDesiredFields(state: DesiredState): RequiredIngressField[] {
  return findMissingFields({
    'service-hostname': state.serviceHostname,
    'service-name': state.serviceName,
    'service-port': state.servicePort,
  });
}

export function isComplete(state: DesiredState): state is CompleteDesiredState {
  return missingDesiredFields(state).length === 0;
}
