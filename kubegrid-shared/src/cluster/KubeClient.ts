/**
 * ClusterClient backed by @kubernetes/client-node.
 */

import {
  Exec,
  KubeConfig,
  KubernetesObjectApi,
  Log,
  PortForward,
  Watch,
  dumpYaml,
} from '@kubernetes/client-node';
import type { V1Status } from '@kubernetes/client-node';
import type { Readable, Writable } from 'stream';
import { ClusterUnavailableError, errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import { apiVersion, collectionPath, isNamespaced, kindInfo } from './resourceKinds';
import type { ResourceKind } from './resourceKinds';
import { detailSections, formatDescribe } from './describe';
import { dig, isRecord, objectName, records, str } from './objects';
import type {
  ClusterClient, ContextInfo, ExecIo, LogOptions, ResourceListing, Subscription, WatchCallbacks, WatchEventType,
} from './types';

const log = getLogger('kube');

const WATCH_EVENT_TYPES = new Set<string>(['ADDED', 'MODIFIED', 'DELETED', 'BOOKMARK', 'ERROR']);

function isWatchEventType(value: string): value is WatchEventType {
  return WATCH_EVENT_TYPES.has(value);
}

export interface LoadOptions {
  /** Path to a kubeconfig file; defaults to $KUBECONFIG or ~/.kube/config. */
  kubeconfig?: string;
  context?: string;
}

function loadKubeConfig(options: LoadOptions): KubeConfig {
  const kc = new KubeConfig();
  try {
    if (options.kubeconfig) kc.loadFromFile(options.kubeconfig);
    else kc.loadFromDefault();
  } catch (err) {
    throw new ClusterUnavailableError(`Could not load kubeconfig: ${errorMessage(err)}`, { cause: err });
  }
  if (options.context) {
    if (!kc.getContextObject(options.context)) {
      throw new ClusterUnavailableError(`Context "${options.context}" not found in kubeconfig`);
    }
    kc.setCurrentContext(options.context);
  }
  if (!kc.getCurrentContext()) {
    throw new ClusterUnavailableError('No current context in kubeconfig');
  }
  return kc;
}

export class KubeClient implements ClusterClient {
  private readonly objects: KubernetesObjectApi;

  private constructor(private readonly kc: KubeConfig, private readonly options: LoadOptions) {
    this.objects = KubernetesObjectApi.makeApiClient(kc);
  }

  /** Throws ClusterUnavailableError when no usable kubeconfig exists. */
  static load(options: LoadOptions = {}): KubeClient {
    return new KubeClient(loadKubeConfig(options), options);
  }

  get context(): string {
    return this.kc.getCurrentContext();
  }

  get namespace(): string {
    return this.kc.getContextObject(this.context)?.namespace || 'default';
  }

  contexts(): ContextInfo[] {
    const current = this.context;
    return this.kc.getContexts().map((c) => ({
      name: c.name,
      cluster: c.cluster,
      namespace: c.namespace,
      current: c.name === current,
    }));
  }

  withContext(name: string): KubeClient {
    return KubeClient.load({ ...this.options, context: name });
  }

  // ── Resources ──

  async listResources(kind: ResourceKind, namespace: string): Promise<ResourceListing> {
    const info = kindInfo(kind);
    const ns = info.namespaced && namespace ? namespace : undefined;
    const result = await this.objects.list(apiVersion(kind), info.apiKind, ns);
    return { items: result.items, resourceVersion: result.metadata?.resourceVersion };
  }

  async watchResources(
    kind: ResourceKind,
    namespace: string,
    resourceVersion: string | undefined,
    callbacks: WatchCallbacks,
  ): Promise<Subscription> {
    const watch = new Watch(this.kc);
    const query: Record<string, string | boolean> = { allowWatchBookmarks: true };
    if (resourceVersion) query.resourceVersion = resourceVersion;

    const controller = await watch.watch(
      collectionPath(kind, isNamespaced(kind) ? namespace : undefined),
      query,
      (phase: string, object: unknown) => {
        if (isWatchEventType(phase)) callbacks.onEvent(phase, object);
      },
      (err: unknown) => callbacks.onDone(err ?? null),
    );
    return { stop: () => controller.abort() };
  }

  async listNamespaces(): Promise<string[]> {
    const result = await this.objects.list('v1', 'Namespace');
    return result.items.map((ns) => objectName(ns)).filter(Boolean).sort();
  }

  async getResource(kind: ResourceKind, name: string, namespace: string): Promise<unknown> {
    return this.objects.read({
      apiVersion: apiVersion(kind),
      kind: kindInfo(kind).apiKind,
      metadata: isNamespaced(kind) ? { name, namespace } : { name },
    });
  }

  async getResourceYaml(kind: ResourceKind, name: string, namespace: string): Promise<string> {
    const obj = await this.getResource(kind, name, namespace);
    if (isRecord(obj) && isRecord(obj.metadata)) {
      const { managedFields: _managed, ...metadata } = obj.metadata;
      return dumpYaml({ ...obj, metadata });
    }
    return dumpYaml(obj);
  }

  async describeResource(kind: ResourceKind, name: string, namespace: string): Promise<string> {
    const obj = await this.getResource(kind, name, namespace);
    return formatDescribe(detailSections(kind, obj));
  }

  async deleteResource(kind: ResourceKind, name: string, namespace: string): Promise<void> {
    log.info({ kind, name, namespace }, 'deleting resource');
    await this.objects.delete({
      apiVersion: apiVersion(kind),
      kind: kindInfo(kind).apiKind,
      metadata: isNamespaced(kind) ? { name, namespace } : { name },
    });
  }

  /** Bumps the pod template annotation, the same mechanism as `kubectl rollout restart`. */
  async restartRollout(kind: ResourceKind, name: string, namespace: string): Promise<void> {
    if (kind !== 'deployments' && kind !== 'statefulsets' && kind !== 'daemonsets') {
      throw new Error(`${kindInfo(kind).displayName} cannot be restarted`);
    }
    log.info({ kind, name, namespace }, 'restarting rollout');
    await this.objects.patch({
      apiVersion: apiVersion(kind),
      kind: kindInfo(kind).apiKind,
      metadata: { name, namespace },
      spec: {
        template: {
          metadata: { annotations: { 'kubectl.kubernetes.io/restartedAt': new Date().toISOString() } },
        },
      },
    });
  }

  // ── Pods ──

  async podContainers(pod: string, namespace: string): Promise<string[]> {
    const obj = await this.getResource('pods', pod, namespace);
    return records(dig(obj, 'spec', 'containers')).map((c) => str(c.name)).filter(Boolean);
  }

  /** Literal env values of the pod's first container. */
  async podEnv(pod: string, namespace: string): Promise<Record<string, string>> {
    const obj = await this.getResource('pods', pod, namespace);
    const [first] = records(dig(obj, 'spec', 'containers'));
    const env: Record<string, string> = {};
    for (const entry of records(first?.env)) {
      if (typeof entry.value === 'string') env[str(entry.name)] = entry.value;
    }
    return env;
  }

  async streamLogs(
    pod: string,
    namespace: string,
    container: string,
    options: LogOptions,
    sink: Writable,
  ): Promise<Subscription> {
    const controller = await new Log(this.kc).log(namespace, pod, container, sink, {
      follow: options.follow,
      tailLines: options.tailLines,
      sinceSeconds: options.sinceSeconds,
      timestamps: options.timestamps,
    });
    return { stop: () => controller.abort() };
  }

  async exec(
    pod: string,
    namespace: string,
    container: string,
    command: string[],
    io: ExecIo,
    tty: boolean,
    onExit: (code: number | null, message?: string) => void,
  ): Promise<Subscription> {
    const socket = await new Exec(this.kc).exec(
      namespace, pod, container, command, io.stdout, io.stderr, io.stdin, tty,
      (status: V1Status) => onExit(exitCodeOf(status), status.message),
    );
    return { stop: () => socket.close() };
  }

  async forwardSocket(pod: string, namespace: string, port: number, socket: Readable & Writable): Promise<void> {
    await new PortForward(this.kc).portForward(namespace, pod, [port], socket, null, socket);
  }
}

/** Exit code carried by an exec status (`Success`, or `NonZeroExitCode` with an ExitCode cause). */
function exitCodeOf(status: V1Status): number | null {
  if (status.status === 'Success') return 0;
  const cause = status.details?.causes?.find((c) => c.reason === 'ExitCode');
  const code = cause?.message ? Number.parseInt(cause.message, 10) : Number.NaN;
  return Number.isNaN(code) ? null : code;
}

/** Contexts of the default kubeconfig, without connecting. */
export function listContexts(options: LoadOptions = {}): ContextInfo[] {
  return KubeClient.load(options).contexts();
}
