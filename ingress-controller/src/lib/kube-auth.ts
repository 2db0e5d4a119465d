import * as fs from 'node:fs';
import * as path from 'node:path';
import * as k8s from '@kubernetes/client-node';

export type KubeAuthSource = 'incluster' | 'kubeconfig';

export interface KubeConfigResolution {
  kubeConfig: k8s.KubeConfig;
  source: KubeAuthSource;
}

export interface KubeAuthOptions {
  // Returns the operator's raw kubeconfig text, if any, at the moment authentication runs.
  kubeConfigText: () => string | undefined;
  kubeconfigWritePath: string;
  initEnvironPath?: string;
  loadFromCluster?: (kubeConfig: k8s.KubeConfig) => void;
}

const IN_CLUSTER_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';
const INIT_ENVIRON_PATH = '/proc/1/environ';
const KUBERNETES_SERVICE_PREFIX = 'KUBERNETES_SERVICE';

/**
 * Copy KUBERNETES_SERVICE_* variables from the init process when this process was started without
 * them, which happens for workloads exec'd into a container by an agent.
 */
export function importKubernetesServiceEnv(environPath: string = INIT_ENVIRON_PATH): string[] {
  if (!fs.existsSync(environPath)) {
    return [];
  }

  let raw: string;
  try {
    raw = fs.readFileSync(environPath, 'utf8');
  } catch (error) {
    console.warn(`Unable to read ${environPath}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }

  const imported: string[] = [];
  for (const entry of raw.split('\0')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const key = entry.slice(0, separator);
    if (!key.includes(KUBERNETES_SERVICE_PREFIX) || process.env[key] !== undefined) {
      continue;
    }

    process.env[key] = entry.slice(separator + 1);
    imported.push(key);
  }

  return imported;
}

function writeKubeconfig(text: string, target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, text, { mode: 0o600 });
}

function loadFromKubeconfigPath(target: string): k8s.KubeConfig {
  const kubeConfig = new k8s.KubeConfig();
  kubeConfig.loadFromFile(target);

  const currentContext = kubeConfig.getCurrentContext();
  if (!currentContext) {
    const contexts = kubeConfig
      .getContexts()
      .map((ctx) => ctx.name)
      .join(', ');
    throw new Error(
      `Kubeconfig has no current-context set: ${target}${contexts ? ` (available contexts: ${contexts})` : ''}`
    );
  }

  if (!kubeConfig.getCurrentCluster()) {
    throw new Error(`Kubeconfig current-context "${currentContext}" does not resolve to an active cluster: ${target}`);
  }

  return kubeConfig;
}

function defaultLoadFromCluster(kubeConfig: k8s.KubeConfig): void {
  if (!process.env.KUBERNETES_SERVICE_HOST || !fs.existsSync(IN_CLUSTER_TOKEN_PATH)) {
    throw new Error(
      'In-cluster credentials not detected (KUBERNETES_SERVICE_HOST or service account token missing); ' +
        'set the kube-config option when running outside Kubernetes'
    );
  }

  kubeConfig.loadFromCluster();
}

/**
 * Once-only credential bootstrap. The first successful call fixes the credentials for the rest of
 * the process; later calls return the same resolution without touching the filesystem. A failed
 * attempt is not memoized, so the next event retries it.
 */
export class KubeAuthenticator {
  private readonly options: KubeAuthOptions;
  private resolution?: KubeConfigResolution;

  constructor(options: KubeAuthOptions) {
    this.options = options;
  }

  get authenticated(): boolean {
    return this.resolution !== undefined;
  }

  authenticate(): KubeConfigResolution {
    if (this.resolution) {
      return this.resolution;
    }

    importKubernetesServiceEnv(this.options.initEnvironPath);

    const text = this.options.kubeConfigText();
    let resolution: KubeConfigResolution;
    if (text) {
      writeKubeconfig(text, this.options.kubeconfigWritePath);
      resolution = {
        kubeConfig: loadFromKubeconfigPath(this.options.kubeconfigWritePath),
        source: 'kubeconfig',
      };
    } else {
      const kubeConfig = new k8s.KubeConfig();
      (this.options.loadFromCluster ?? defaultLoadFromCluster)(kubeConfig);
      resolution = { kubeConfig, source: 'incluster' };
    }

    console.info(`Kubernetes client authenticated (auth=${resolution.source})`);
    this.resolution = resolution;
    return resolution;
  }
}
