import { describe, test, expect } from 'vitest';
import { DocumentBuilder } from '../../../src/converters/shared/document-builder';

describe('DocumentBuilder', () => {
  test('assigns bufferView indices in append order', () => {
    const builder = new DocumentBuilder();
    const first = builder.addAccessor({ componentType: 5121, type: 'SCALAR', count: 3 }, new Uint8Array([1, 2, 3]), 'a');
    const second = builder.addAccessor({ componentType: 5126, type: 'SCALAR', count: 1 }, new Uint8Array(4), 'b');

    const { tree, bufferItems } = builder.build({});
    expect([first, second]).toEqual([0, 1]);
    expect(tree.accessors?.map(accessor => accessor.bufferView)).toEqual([0, 1]);
    expect(bufferItems.map(item => item.owner)).toEqual(['a', 'b']);
  });

  test('pads every buffer item to 4 bytes', () => {
    const builder = new DocumentBuilder();
    builder.addAccessor({ componentType: 5121, type: 'SCALAR', count: 3 }, new Uint8Array([1, 2, 3]), 'a');

    const [item] = builder.build({}).bufferItems;
    expect(Array.from(item.data)).toEqual([1, 2, 3, 0]);
  });

  test('omits the materials key when no material was added', () => {
    const { tree } = new DocumentBuilder().build({ materials: [] });
    expect('materials' in tree).toBe(false);
  });

  test('shares a keyed material', () => {
    const builder = new DocumentBuilder();
    const a = builder.addSharedMaterial('path', () => ({ name: 'line' }));
    const b = builder.addSharedMaterial('path', () => ({ name: 'other' }));

    expect(a).toBe(b);
    expect(builder.build({}).tree.materials).toEqual([{ name: 'line' }]);
  });
});
