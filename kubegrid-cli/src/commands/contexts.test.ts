import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { formatContexts } from './contexts';

describe('formatContexts', () => {
  let level: typeof chalk.level;
  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });
  afterAll(() => {
    chalk.level = level;
  });

  it('aligns columns and marks the current context', () => {
    const out = formatContexts([
      { name: 'dev', cluster: 'kind-dev', namespace: 'apps', current: false },
      { name: 'production', cluster: 'prod', current: true },
    ]);
    expect(out.split('\n')).toEqual([
      '  NAME        CLUSTER   NAMESPACE',
      '  dev         kind-dev  apps',
      '* production  prod      -',
      '',
    ]);
  });

  it('reports an empty kubeconfig', () => {
    expect(formatContexts([])).toBe('No contexts found.\n');
  });
});
