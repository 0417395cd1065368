import { describe, expect, it } from 'vitest';
import { JsonPatchDocument, RawJsonPatch, toJsonPointer } from '../lib/json-patch.ts';
import type { Deployment } from './helpers/fake-client.ts';

describe('toJsonPointer', () => {
  it('escapes ~ and / inside segments', () => {
    expect(toJsonPointer(['metadata', 'annotations', 'example.com/owner'])).toBe('/metadata/annotations/example.com~1owner');
    expect(toJsonPointer(['a~b', 0])).toBe('/a~0b/0');
    expect(toJsonPointer([])).toBe('');
  });
});

describe('JsonPatchDocument', () => {
  it('builds operations from typed paths', () => {
    const patch = new JsonPatchDocument<Deployment>()
      .test(['metadata', 'resourceVersion'], '101')
      .replace(['spec', 'replicas'], 3)
      .add(['metadata', 'annotations', 'example.com/owner'], 'team-a')
      .remove(['spec', 'paused'])
      .copy(['metadata', 'name'], ['spec', 'template', 'metadata', 'labels', 'app']);

    expect(patch.toJSON()).toEqual([
      { op: 'test', path: '/metadata/resourceVersion', value: '101' },
      { op: 'replace', path: '/spec/replicas', value: 3 },
      { op: 'add', path: '/metadata/annotations/example.com~1owner', value: 'team-a' },
      { op: 'remove', path: '/spec/paused' },
      { op: 'copy', from: '/metadata/name', path: '/spec/template/metadata/labels/app' },
    ]);
    expect(() => patch.validate()).not.toThrow();
  });

  it('serializes as the bare operation array', () => {
    const patch = new JsonPatchDocument<Deployment>().replace(['spec', 'paused'], true);
    expect(JSON.stringify(patch)).toBe('[{"op":"replace","path":"/spec/paused","value":true}]');
  });
});

describe('RawJsonPatch', () => {
  it('takes pointers as given', () => {
    const patch = new RawJsonPatch()
      .add('/metadata/labels/tier', 'web')
      .move('/spec/old', '/spec/new');
    expect(patch.operations).toEqual([
      { op: 'add', path: '/metadata/labels/tier', value: 'web' },
      { op: 'move', from: '/spec/old', path: '/spec/new' },
    ]);
  });

  it('refuses a pointer without a leading slash', () => {
    const patch = new RawJsonPatch().replace('spec/replicas', 3);
    expect(() => patch.validate()).toThrow(/Invalid JSON-Patch operation #0/);
  });

  it('refuses an add without a value', () => {
    const patch = new RawJsonPatch()
      .remove('/spec/paused')
      .add('/spec/replicas', undefined);
    expect(() => patch.validate()).toThrow(/Invalid JSON-Patch operation #1/);
  });
});
