/**
 * Turns API objects into table rows, one column layout per resource kind.
 */

import { isNamespaced } from './resourceKinds';
import type { ResourceKind } from './resourceKinds';
import { dig, list, num, objectName, objectNamespace, records, str } from './objects';

export interface ResourceRow {
  name: string;
  namespace: string;
  cells: string[];
}

const COLUMNS: Record<ResourceKind, string[]> = {
  pods: ['NAME', 'NAMESPACE', 'STATUS', 'READY', 'RESTARTS', 'AGE', 'NODE'],
  deployments: ['NAME', 'NAMESPACE', 'READY', 'UP-TO-DATE', 'AVAILABLE', 'AGE'],
  services: ['NAME', 'NAMESPACE', 'TYPE', 'CLUSTER-IP', 'EXTERNAL-IP', 'PORT(S)', 'AGE'],
  statefulsets: ['NAME', 'NAMESPACE', 'READY', 'AGE'],
  daemonsets: ['NAME', 'NAMESPACE', 'DESIRED', 'CURRENT', 'READY', 'AGE'],
  jobs: ['NAME', 'NAMESPACE', 'COMPLETIONS', 'DURATION', 'AGE'],
  cronjobs: ['NAME', 'NAMESPACE', 'SCHEDULE', 'SUSPEND', 'ACTIVE', 'LAST SCHEDULE', 'AGE'],
  configmaps: ['NAME', 'NAMESPACE', 'DATA', 'AGE'],
  secrets: ['NAME', 'NAMESPACE', 'TYPE', 'DATA', 'AGE'],
  ingresses: ['NAME', 'NAMESPACE', 'CLASS', 'HOSTS', 'ADDRESS', 'PORTS', 'AGE'],
  nodes: ['NAME', 'STATUS', 'ROLES', 'AGE', 'VERSION'],
  namespaces: ['NAME', 'STATUS', 'AGE'],
  persistentvolumes: ['NAME', 'CAPACITY', 'ACCESS MODES', 'RECLAIM POLICY', 'STATUS', 'CLAIM', 'STORAGECLASS', 'AGE'],
  persistentvolumeclaims: ['NAME', 'NAMESPACE', 'STATUS', 'VOLUME', 'CAPACITY', 'ACCESS MODES', 'STORAGECLASS', 'AGE'],
};

export function headersFor(kind: ResourceKind): string[] {
  return [...COLUMNS[kind]];
}

// ── Time ──

/** 30s, 5m, 2h, 3d. */
export function formatDuration(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  if (s < 60) return `${s}s`;
  if (s < 3600) return `${Math.floor(s / 60)}m`;
  if (s < 86400) return `${Math.floor(s / 3600)}h`;
  return `${Math.floor(s / 86400)}d`;
}

function ageOf(timestamp: unknown, now: number): string {
  const parsed = Date.parse(str(timestamp));
  if (Number.isNaN(parsed)) return '<unknown>';
  return formatDuration((now - parsed) / 1000);
}

// ── Per-kind cells ──

type CellBuilder = (obj: unknown, now: number) => string[];

function podStatus(obj: unknown): string {
  if (dig(obj, 'metadata', 'deletionTimestamp')) return 'Terminating';
  for (const cs of records(dig(obj, 'status', 'containerStatuses'))) {
    const reason = str(dig(cs, 'state', 'waiting', 'reason'));
    if (reason) return reason;
  }
  return str(dig(obj, 'status', 'phase'), 'Unknown');
}

const pods: CellBuilder = (obj, now) => {
  const statuses = records(dig(obj, 'status', 'containerStatuses'));
  const ready = statuses.filter((cs) => cs.ready === true).length;
  const restarts = statuses.reduce((sum, cs) => sum + num(cs.restartCount), 0);
  return [
    podStatus(obj),
    `${ready}/${statuses.length}`,
    String(restarts),
    ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
    str(dig(obj, 'spec', 'nodeName')),
  ];
};

const deployments: CellBuilder = (obj, now) => [
  `${num(dig(obj, 'status', 'readyReplicas'))}/${num(dig(obj, 'spec', 'replicas'), 1)}`,
  String(num(dig(obj, 'status', 'updatedReplicas'))),
  String(num(dig(obj, 'status', 'availableReplicas'))),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

function servicePorts(obj: unknown): string {
  const ports = records(dig(obj, 'spec', 'ports')).map((p) => {
    const nodePort = p.nodePort ? `:${str(p.nodePort)}` : '';
    return `${str(p.port)}${nodePort}/${str(p.protocol, 'TCP')}`;
  });
  return ports.length > 0 ? ports.join(',') : '<none>';
}

function externalIp(obj: unknown): string {
  const ingress = records(dig(obj, 'status', 'loadBalancer', 'ingress'))
    .map((i) => str(i.ip) || str(i.hostname))
    .filter(Boolean);
  if (ingress.length > 0) return ingress.join(',');
  const external = list(dig(obj, 'spec', 'externalIPs')).map((ip) => str(ip)).filter(Boolean);
  if (external.length > 0) return external.join(',');
  return str(dig(obj, 'spec', 'type')) === 'LoadBalancer' ? '<pending>' : '<none>';
}

const services: CellBuilder = (obj, now) => [
  str(dig(obj, 'spec', 'type'), 'ClusterIP'),
  str(dig(obj, 'spec', 'clusterIP'), '<none>'),
  externalIp(obj),
  servicePorts(obj),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

const statefulsets: CellBuilder = (obj, now) => [
  `${num(dig(obj, 'status', 'readyReplicas'))}/${num(dig(obj, 'spec', 'replicas'), 1)}`,
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

const daemonsets: CellBuilder = (obj, now) => [
  String(num(dig(obj, 'status', 'desiredNumberScheduled'))),
  String(num(dig(obj, 'status', 'currentNumberScheduled'))),
  String(num(dig(obj, 'status', 'numberReady'))),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

function jobDuration(obj: unknown, now: number): string {
  const start = Date.parse(str(dig(obj, 'status', 'startTime')));
  if (Number.isNaN(start)) return '';
  const end = Date.parse(str(dig(obj, 'status', 'completionTime')));
  return formatDuration(((Number.isNaN(end) ? now : end) - start) / 1000);
}

const jobs: CellBuilder = (obj, now) => [
  `${num(dig(obj, 'status', 'succeeded'))}/${num(dig(obj, 'spec', 'completions'), 1)}`,
  jobDuration(obj, now),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

const cronjobs: CellBuilder = (obj, now) => {
  const last = dig(obj, 'status', 'lastScheduleTime');
  return [
    str(dig(obj, 'spec', 'schedule')),
    String(dig(obj, 'spec', 'suspend') === true),
    String(list(dig(obj, 'status', 'active')).length),
    last ? ageOf(last, now) : '<none>',
    ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
  ];
};

function keyCount(value: unknown): number {
  return value && typeof value === 'object' ? Object.keys(value).length : 0;
}

const configmaps: CellBuilder = (obj, now) => [
  String(keyCount(dig(obj, 'data')) + keyCount(dig(obj, 'binaryData'))),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

const secrets: CellBuilder = (obj, now) => [
  str(dig(obj, 'type'), 'Opaque'),
  String(keyCount(dig(obj, 'data'))),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

const ingresses: CellBuilder = (obj, now) => {
  const rules = records(dig(obj, 'spec', 'rules'));
  const hosts = rules.map((r) => str(r.host)).filter(Boolean);
  const address = records(dig(obj, 'status', 'loadBalancer', 'ingress'))
    .map((i) => str(i.ip) || str(i.hostname))
    .filter(Boolean);
  const ports = records(dig(obj, 'spec', 'tls')).length > 0 ? '80, 443' : '80';
  return [
    str(dig(obj, 'spec', 'ingressClassName'), '<none>'),
    hosts.length > 0 ? hosts.join(',') : '*',
    address.join(','),
    ports,
    ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
  ];
};

const ROLE_PREFIX = 'node-role.kubernetes.io/';

const nodes: CellBuilder = (obj, now) => {
  const ready = records(dig(obj, 'status', 'conditions')).find((c) => c.type === 'Ready');
  let status = ready ? (ready.status === 'True' ? 'Ready' : 'NotReady') : 'Unknown';
  if (dig(obj, 'spec', 'unschedulable') === true) status += ',SchedulingDisabled';
  const labels = dig(obj, 'metadata', 'labels');
  const roles = labels && typeof labels === 'object'
    ? Object.keys(labels).filter((k) => k.startsWith(ROLE_PREFIX)).map((k) => k.slice(ROLE_PREFIX.length))
    : [];
  return [
    status,
    roles.length > 0 ? roles.join(',') : '<none>',
    ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
    str(dig(obj, 'status', 'nodeInfo', 'kubeletVersion')),
  ];
};

const namespaces: CellBuilder = (obj, now) => [
  str(dig(obj, 'status', 'phase'), 'Active'),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

function accessModes(value: unknown): string {
  const short: Record<string, string> = {
    ReadWriteOnce: 'RWO',
    ReadOnlyMany: 'ROX',
    ReadWriteMany: 'RWX',
    ReadWriteOncePod: 'RWOP',
  };
  return list(value).map((m) => short[str(m)] ?? str(m)).join(',');
}

const persistentvolumes: CellBuilder = (obj, now) => {
  const claimNs = str(dig(obj, 'spec', 'claimRef', 'namespace'));
  const claimName = str(dig(obj, 'spec', 'claimRef', 'name'));
  return [
    str(dig(obj, 'spec', 'capacity', 'storage')),
    accessModes(dig(obj, 'spec', 'accessModes')),
    str(dig(obj, 'spec', 'persistentVolumeReclaimPolicy')),
    str(dig(obj, 'status', 'phase')),
    claimName ? `${claimNs}/${claimName}` : '',
    str(dig(obj, 'spec', 'storageClassName')),
    ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
  ];
};

const persistentvolumeclaims: CellBuilder = (obj, now) => [
  str(dig(obj, 'status', 'phase')),
  str(dig(obj, 'spec', 'volumeName')),
  str(dig(obj, 'status', 'capacity', 'storage')),
  accessModes(dig(obj, 'status', 'accessModes')),
  str(dig(obj, 'spec', 'storageClassName')),
  ageOf(dig(obj, 'metadata', 'creationTimestamp'), now),
];

const BUILDERS: Record<ResourceKind, CellBuilder> = {
  pods, deployments, services, statefulsets, daemonsets, jobs, cronjobs,
  configmaps, secrets, ingresses, nodes, namespaces, persistentvolumes, persistentvolumeclaims,
};

/** One table row for `obj`, aligned with {@link headersFor}. */
export function summarize(kind: ResourceKind, obj: unknown, now: number = Date.now()): ResourceRow {
  const name = objectName(obj);
  const namespace = objectNamespace(obj);
  const identity = isNamespaced(kind) ? [name, namespace] : [name];
  return { name, namespace, cells: [...identity, ...BUILDERS[kind](obj, now)] };
}

/** Rows ordered by namespace, then name. */
export function summarizeAll(kind: ResourceKind, objects: Iterable<unknown>, now: number = Date.now()): ResourceRow[] {
  return [...objects]
    .map((obj) => summarize(kind, obj, now))
    .sort((a, b) => a.namespace.localeCompare(b.namespace) || a.name.localeCompare(b.name));
}
