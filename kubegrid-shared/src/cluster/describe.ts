/**
 * `kubectl describe`-style text for an API object.
 */

import { kindInfo } from './resourceKinds';
import type { ResourceKind } from './resourceKinds';
import { dig, isRecord, records, str } from './objects';
import { headersFor, summarize } from './summarize';

export interface DetailSection {
  title: string;
  fields: Array<[string, string]>;
}

const LABEL_WIDTH = 14;

function mapLines(value: unknown): string[] {
  if (!isRecord(value)) return [];
  return Object.entries(value).map(([k, v]) => `${k}=${str(v)}`);
}

function containerFields(containers: unknown, statuses: unknown): Array<[string, string]> {
  const byName = new Map(records(statuses).map((s) => [str(s.name), s]));
  const fields: Array<[string, string]> = [];
  for (const c of records(containers)) {
    const name = str(c.name);
    const status = byName.get(name);
    const parts = [str(c.image)];
    if (status) {
      parts.push(status.ready === true ? 'ready' : 'not ready');
      parts.push(`restarts ${str(status.restartCount, '0')}`);
    }
    fields.push([name, parts.join(', ')]);
  }
  return fields;
}

/** Sections shown by describe views; the first is always metadata. */
export function detailSections(kind: ResourceKind, obj: unknown, now: number = Date.now()): DetailSection[] {
  const metadata: Array<[string, string]> = [['Name', str(dig(obj, 'metadata', 'name'))]];
  const ns = str(dig(obj, 'metadata', 'namespace'));
  if (ns) metadata.push(['Namespace', ns]);
  metadata.push(['Kind', kindInfo(kind).apiKind]);
  const labels = mapLines(dig(obj, 'metadata', 'labels'));
  metadata.push(['Labels', labels.length > 0 ? labels.join('\n') : '<none>']);
  const annotations = mapLines(dig(obj, 'metadata', 'annotations'));
  metadata.push(['Annotations', annotations.length > 0 ? `${annotations.length} keys` : '<none>']);
  metadata.push(['Created', str(dig(obj, 'metadata', 'creationTimestamp'), '<unknown>')]);

  const sections: DetailSection[] = [{ title: 'Metadata', fields: metadata }];

  const headers = headersFor(kind);
  const cells = summarize(kind, obj, now).cells;
  const summary: Array<[string, string]> = [];
  headers.forEach((header, i) => {
    if (header !== 'NAME' && header !== 'NAMESPACE') summary.push([titleCase(header), cells[i] ?? '']);
  });
  sections.push({ title: 'Status', fields: summary });

  if (kind === 'pods') {
    sections.push({
      title: 'Containers',
      fields: containerFields(dig(obj, 'spec', 'containers'), dig(obj, 'status', 'containerStatuses')),
    });
    const ip = str(dig(obj, 'status', 'podIP'));
    if (ip) summary.push(['IP', ip]);
  } else if (kind === 'deployments' || kind === 'statefulsets' || kind === 'daemonsets') {
    sections.push({
      title: 'Pod Template',
      fields: containerFields(dig(obj, 'spec', 'template', 'spec', 'containers'), undefined),
    });
    const selector = mapLines(dig(obj, 'spec', 'selector', 'matchLabels'));
    if (selector.length > 0) summary.push(['Selector', selector.join(',')]);
  } else if (kind === 'services') {
    const selector = mapLines(dig(obj, 'spec', 'selector'));
    summary.push(['Selector', selector.length > 0 ? selector.join(',') : '<none>']);
  } else if (kind === 'configmaps' || kind === 'secrets') {
    const data = dig(obj, 'data');
    const keys = isRecord(data) ? Object.keys(data) : [];
    sections.push({ title: 'Data', fields: keys.map((k) => [k, kind === 'secrets' ? '<hidden>' : preview(str(isRecord(data) ? data[k] : ''))]) });
  }

  return sections;
}

function titleCase(header: string): string {
  return header
    .toLowerCase()
    .split(/([ -])/)
    .map((part) => (part.length > 0 ? part[0].toUpperCase() + part.slice(1) : part))
    .join('');
}

function preview(value: string): string {
  const firstLine = value.split('\n')[0];
  const suffix = value.includes('\n') ? ' …' : '';
  return firstLine.length > 60 ? `${firstLine.slice(0, 60)}…` : firstLine + suffix;
}

/** Renders sections as aligned plain text. Multi-line values are indented under the label column. */
export function formatDescribe(sections: DetailSection[]): string {
  const out: string[] = [];
  for (const section of sections) {
    if (out.length > 0) out.push('');
    out.push(`${section.title}:`);
    if (section.fields.length === 0) {
      out.push('  <none>');
      continue;
    }
    for (const [label, value] of section.fields) {
      const [first, ...rest] = value.split('\n');
      out.push(`  ${`${label}:`.padEnd(LABEL_WIDTH)}${first}`);
      for (const line of rest) out.push(`  ${' '.repeat(LABEL_WIDTH)}${line}`);
    }
  }
  return out.join('\n');
}
