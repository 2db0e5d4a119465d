import type * as k8s from '@kubernetes/client-node';
import type { CompleteDesiredState } from '../types/ingress';

const LABEL_APP_NAME = 'app.kubernetes.io/name';

const NGINX_PREFIX = 'nginx.ingress.kubernetes.io';
export const ANN_REWRITE_TARGET = `${NGINX_PREFIX}/rewrite-target`;
export const ANN_PROXY_BODY_SIZE = `${NGINX_PREFIX}/proxy-body-size`;
export const ANN_AFFINITY = `${NGINX_PREFIX}/affinity`;
export const ANN_AFFINITY_MODE = `${NGINX_PREFIX}/affinity-mode`;
export const ANN_COOKIE_CHANGE_ON_FAILURE = `${NGINX_PREFIX}/session-cookie-change-on-failure`;
export const ANN_COOKIE_MAX_AGE = `${NGINX_PREFIX}/session-cookie-max-age`;
export const ANN_COOKIE_NAME = `${NGINX_PREFIX}/session-cookie-name`;
export const ANN_COOKIE_SAMESITE = `${NGINX_PREFIX}/session-cookie-samesite`;
export const ANN_SSL_REDIRECT = `${NGINX_PREFIX}/ssl-redirect`;

// Kept distinct from any Service named after the application itself.
export function serviceResourceName(serviceName: string): string {
  return `${serviceName}-service`;
}

export function ingressResourceName(serviceName: string): string {
  return `${serviceName}-ingress`;
}

export function buildIngressAnnotations(state: CompleteDesiredState): Record<string, string> {
  const annotations: Record<string, string> = {
    [ANN_REWRITE_TARGET]: '/',
  };

  if (state.maxBodySize) {
    annotations[ANN_PROXY_BODY_SIZE] = state.maxBodySize;
  }

  if (state.sessionCookieMaxAge) {
    annotations[ANN_AFFINITY] = 'cookie';
    annotations[ANN_AFFINITY_MODE] = 'balanced';
    annotations[ANN_COOKIE_CHANGE_ON_FAILURE] = 'true';
    annotations[ANN_COOKIE_MAX_AGE] = state.sessionCookieMaxAge;
    annotations[ANN_COOKIE_NAME] = `${state.serviceName.toUpperCase()}_AFFINITY`;
    annotations[ANN_COOKIE_SAMESITE] = 'Lax';
  }

  if (!state.tlsSecretName) {
    annotations[ANN_SSL_REDIRECT] = 'false';
  }

  return annotations;
}

export function buildService(state: CompleteDesiredState): k8s.V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: serviceResourceName(state.serviceName),
    },
    spec: {
      selector: { [LABEL_APP_NAME]: state.serviceName },
      ports: [
        {
          name: `tcp-${state.servicePort}`,
          port: state.servicePort,
          targetPort: state.servicePort,
        },
      ],
    },
  };
}

export function buildIngress(state: CompleteDesiredState): k8s.V1Ingress {
  const spec: k8s.V1IngressSpec = {
    rules: [
      {
        host: state.serviceHostname,
        http: {
          paths: [
            {
              path: '/',
              pathType: 'Prefix',
              backend: {
                service: {
                  name: serviceResourceName(state.serviceName),
                  port: { number: state.servicePort },
                },
              },
            },
          ],
        },
      },
    ],
  };

  if (state.tlsSecretName) {
    spec.tls = [
      {
        hosts: [state.serviceHostname],
        secretName: state.tlsSecretName,
      },
    ];
  }

  return {
    apiVersion: 'networking.k8s.io/v1',
    kind: 'Ingress',
    metadata: {
      name: ingressResourceName(state.serviceName),
      annotations: buildIngressAnnotations(state),
    },
    spec,
  };
}
