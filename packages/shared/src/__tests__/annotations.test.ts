import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ANNOTATIONS,
  createChangeConfig,
  excludeAnnotationFor,
  reloadAnnotationFor,
  typedAutoAnnotationFor,
} from '../annotations.js';
import { kindSuffix } from '../types.js';

describe('annotation keys', () => {
  it('resolves the per-kind keys', () => {
    expect(reloadAnnotationFor('configmap', DEFAULT_ANNOTATIONS)).toBe('configmap.reloader.stakater.com/reload');
    expect(reloadAnnotationFor('secret', DEFAULT_ANNOTATIONS)).toBe('secret.reloader.stakater.com/reload');
    expect(typedAutoAnnotationFor('secret', DEFAULT_ANNOTATIONS)).toBe('secret.reloader.stakater.com/auto');
    expect(excludeAnnotationFor('configmap', DEFAULT_ANNOTATIONS)).toBe(
      'configmaps.exclude.reloader.stakater.com/reload',
    );
  });

  it('follows overridden keys', () => {
    const keys = { ...DEFAULT_ANNOTATIONS, secretReload: 'example.com/secrets' };
    expect(reloadAnnotationFor('secret', keys)).toBe('example.com/secrets');
  });

  it('maps kinds to their suffix', () => {
    expect(kindSuffix('configmap')).toBe('CONFIGMAP');
    expect(kindSuffix('secret')).toBe('SECRET');
  });
});

describe('createChangeConfig', () => {
  it('fills in the keys for the resource kind', () => {
    const change = createChangeConfig(
      { kind: 'secret', name: 'db-creds', namespace: 'prod', contentHash: 'abc', annotations: { a: 'b' } },
      DEFAULT_ANNOTATIONS,
    );
    expect(change).toEqual({
      resourceName: 'db-creds',
      namespace: 'prod',
      kind: 'secret',
      annotationKey: 'secret.reloader.stakater.com/reload',
      typedAutoAnnotationKey: 'secret.reloader.stakater.com/auto',
      contentHash: 'abc',
      resourceAnnotations: { a: 'b' },
    });
  });

  it('is immutable and detached from the source annotations', () => {
    const annotations: Record<string, string> = { a: 'b' };
    const change = createChangeConfig(
      { kind: 'configmap', name: 'cfg', namespace: 'default', contentHash: 'h', annotations },
      DEFAULT_ANNOTATIONS,
    );
    annotations.a = 'changed';
    expect(change.resourceAnnotations).toEqual({ a: 'b' });
    expect(Object.isFrozen(change)).toBe(true);
    expect(Object.isFrozen(change.resourceAnnotations)).toBe(true);
  });
});
