/**
 * Catalog of resource kinds the dashboard can list and watch.
 */

export const RESOURCE_KINDS = [
  'pods',
  'deployments',
  'services',
  'statefulsets',
  'daemonsets',
  'jobs',
  'cronjobs',
  'configmaps',
  'secrets',
  'ingresses',
  'nodes',
  'namespaces',
  'persistentvolumes',
  'persistentvolumeclaims',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface ResourceKindInfo {
  kind: ResourceKind;
  /** The `Kind` field of the API object. */
  apiKind: string;
  shortName: string;
  displayName: string;
  namespaced: boolean;
  /** Empty for the core group. */
  group: string;
  version: string;
}

const INFO: Record<ResourceKind, Omit<ResourceKindInfo, 'kind'>> = {
  pods: { apiKind: 'Pod', shortName: 'po', displayName: 'Pods', namespaced: true, group: '', version: 'v1' },
  deployments: { apiKind: 'Deployment', shortName: 'deploy', displayName: 'Deployments', namespaced: true, group: 'apps', version: 'v1' },
  services: { apiKind: 'Service', shortName: 'svc', displayName: 'Services', namespaced: true, group: '', version: 'v1' },
  statefulsets: { apiKind: 'StatefulSet', shortName: 'sts', displayName: 'StatefulSets', namespaced: true, group: 'apps', version: 'v1' },
  daemonsets: { apiKind: 'DaemonSet', shortName: 'ds', displayName: 'DaemonSets', namespaced: true, group: 'apps', version: 'v1' },
  jobs: { apiKind: 'Job', shortName: 'job', displayName: 'Jobs', namespaced: true, group: 'batch', version: 'v1' },
  cronjobs: { apiKind: 'CronJob', shortName: 'cj', displayName: 'CronJobs', namespaced: true, group: 'batch', version: 'v1' },
  configmaps: { apiKind: 'ConfigMap', shortName: 'cm', displayName: 'ConfigMaps', namespaced: true, group: '', version: 'v1' },
  secrets: { apiKind: 'Secret', shortName: 'secret', displayName: 'Secrets', namespaced: true, group: '', version: 'v1' },
  ingresses: { apiKind: 'Ingress', shortName: 'ing', displayName: 'Ingresses', namespaced: true, group: 'networking.k8s.io', version: 'v1' },
  nodes: { apiKind: 'Node', shortName: 'no', displayName: 'Nodes', namespaced: false, group: '', version: 'v1' },
  namespaces: { apiKind: 'Namespace', shortName: 'ns', displayName: 'Namespaces', namespaced: false, group: '', version: 'v1' },
  persistentvolumes: { apiKind: 'PersistentVolume', shortName: 'pv', displayName: 'PersistentVolumes', namespaced: false, group: '', version: 'v1' },
  persistentvolumeclaims: { apiKind: 'PersistentVolumeClaim', shortName: 'pvc', displayName: 'PersistentVolumeClaims', namespaced: true, group: '', version: 'v1' },
};

export function kindInfo(kind: ResourceKind): ResourceKindInfo {
  return { kind, ...INFO[kind] };
}

export function isNamespaced(kind: ResourceKind): boolean {
  return INFO[kind].namespaced;
}

export function isResourceKind(value: string): value is ResourceKind {
  return (RESOURCE_KINDS as readonly string[]).includes(value);
}

/**
 * Resolves user input (`po`, `pods`, `Pod`, `deploy`) to a kind.
 * Returns null when nothing matches.
 */
export function parseResourceKind(input: string): ResourceKind | null {
  const needle = input.trim().toLowerCase();
  if (!needle) return null;
  for (const kind of RESOURCE_KINDS) {
    const info = INFO[kind];
    if (kind === needle || info.shortName === needle || info.apiKind.toLowerCase() === needle) {
      return kind;
    }
  }
  return null;
}

/** REST collection path for a kind, optionally scoped to a namespace. */
export function collectionPath(kind: ResourceKind, namespace?: string): string {
  const { group, version, namespaced } = INFO[kind];
  const base = group ? `/apis/${group}/${version}` : `/api/${version}`;
  if (namespaced && namespace) return `${base}/namespaces/${namespace}/${kind}`;
  return `${base}/${kind}`;
}

export function apiVersion(kind: ResourceKind): string {
  const { group, version } = INFO[kind];
  return group ? `${group}/${version}` : version;
}
