/**
 * Tests for mesh assembly: faces, attributes, UV flip and naming
 */

import { describe, test, expect, vi } from 'vitest';
import { assembleMeshes, flipTexcoords } from '../../../src/converters/helpers/mesh-assembler';
import type { ResolvedAccessor } from '../../../src/converters/helpers/accessor-resolver';
import { PbrMaterial } from '../../../src/converters/helpers/material-mapper';
import { DEGRADATIONS } from '../../../src/constants/errors';
import { GltfFormatError } from '../../../src/errors';
import type { GltfDocument, GltfPrimitive } from '../../../src/schemas/gltf-document';
import { quietLogger } from '../../fixtures/scenes';

function float(values: number[], width: number): ResolvedAccessor {
  return {
    array: Float32Array.from(values),
    shape: width === 1 ? [values.length] : [values.length / width, width],
    componentType: 5126,
    type: width === 1 ? 'SCALAR' : width === 2 ? 'VEC2' : width === 3 ? 'VEC3' : 'VEC4',
    normalized: false,
  };
}

function uint(values: number[]): ResolvedAccessor {
  return { array: Uint32Array.from(values), shape: [values.length], componentType: 5125, type: 'SCALAR', normalized: false };
}

// 0: positions, 1: indices, 2: texcoords
const ACCESSORS = [
  float([0, 0, 0, 1, 0, 0, 0, 1, 0], 3),
  uint([0, 1, 2]),
  float([0, 0.2, 1, 0.2, 0.5, 0.7], 2),
];

function meshTree(primitive: Partial<GltfPrimitive>, name: string | undefined = 'tri'): GltfDocument {
  return {
    meshes: [{ name, primitives: [{ attributes: { POSITION: 0 }, indices: 1, ...primitive }] }],
  };
}

describe('assembleMeshes', () => {
  test('reads vertices and faces', () => {
    const { geometry, meshNames } = assembleMeshes(meshTree({}), ACCESSORS, [], quietLogger());
    const tri = geometry.get('tri');

    expect(meshNames).toEqual([['tri']]);
    expect(Array.from(tri?.faces ?? [])).toEqual([0, 1, 2]);
    expect(tri?.vertices).toEqual(Float32Array.from([0, 0, 0, 1, 0, 0, 0, 1, 0]));
    expect(tri?.metadata).toEqual({});
  });

  test('flips v of texture coordinates', () => {
    const material = new PbrMaterial({ name: 'painted' });
    const { geometry } = assembleMeshes(
      meshTree({ attributes: { POSITION: 0, TEXCOORD_0: 2 }, material: 0 }),
      ACCESSORS,
      [material],
      quietLogger()
    );
    const visual = geometry.get('tri')?.visual;

    expect(visual?.material).toBe(material);
    expect(visual?.uv[0]).toBe(0);
    expect(visual?.uv[1]).toBeCloseTo(0.8, 6);
    expect(visual?.uv[5]).toBeCloseTo(0.3, 6);
  });

  test('ignores texture coordinates without a material', () => {
    const logger = quietLogger();
    const warn = vi.spyOn(logger, 'warn');
    const { geometry } = assembleMeshes(meshTree({ attributes: { POSITION: 0, TEXCOORD_0: 2 } }), ACCESSORS, [], logger);

    expect(geometry.get('tri')?.visual).toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({ degradation: DEGRADATIONS.TEXCOORD_WITHOUT_MATERIAL })
    );
  });

  test('loads untextured geometry when the material was not resolved', () => {
    const { geometry } = assembleMeshes(
      meshTree({ attributes: { POSITION: 0, TEXCOORD_0: 2 }, material: 0 }),
      ACCESSORS,
      [],
      quietLogger()
    );
    expect(geometry.get('tri')?.visual).toBeUndefined();
    expect(geometry.get('tri')?.faces.length).toBe(3);
  });

  test('builds sequential faces when indices are absent', () => {
    const tree: GltfDocument = { meshes: [{ name: 'tri', primitives: [{ attributes: { POSITION: 0 } }] }] };
    const { geometry } = assembleMeshes(tree, ACCESSORS, [], quietLogger());
    expect(Array.from(geometry.get('tri')?.faces ?? [])).toEqual([0, 1, 2]);
  });

  test('rejects indices that are not a multiple of 3', () => {
    const accessors = [ACCESSORS[0], uint([0, 1])];
    expect(() => assembleMeshes(meshTree({}), accessors, [], quietLogger())).toThrow(GltfFormatError);
  });

  test('rejects a primitive without positions', () => {
    const tree: GltfDocument = { meshes: [{ primitives: [{ attributes: {}, indices: 1 }] }] };
    expect(() => assembleMeshes(tree, ACCESSORS, [], quietLogger())).toThrow('primitive has no POSITION attribute');
  });

  test('skips primitives that are not triangles', () => {
    const { geometry, meshNames } = assembleMeshes(meshTree({ mode: 1 }), ACCESSORS, [], quietLogger());
    expect(geometry.size).toBe(0);
    expect(meshNames).toEqual([[]]);
  });

  test('attaches colors and normals', () => {
    const accessors = [
      ...ACCESSORS,
      float([1, 0, 0, 0, 1, 0, 0, 0, 1], 3),
      float([0, 0, 1, 0, 0, 1, 0, 0, 1], 3),
    ];
    const { geometry } = assembleMeshes(
      meshTree({ attributes: { POSITION: 0, COLOR_0: 3, NORMAL: 4 } }),
      accessors,
      [],
      quietLogger()
    );
    const tri = geometry.get('tri');

    expect(Array.from(tri?.vertexColors ?? [])).toEqual([255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255]);
    expect(tri?.vertexNormals).toEqual(Float32Array.from([0, 0, 1, 0, 0, 1, 0, 0, 1]));
  });

  test('copies units from mesh extras', () => {
    const tree: GltfDocument = {
      meshes: [{ name: 'tri', extras: { units: 'mm' }, primitives: [{ attributes: { POSITION: 0 }, indices: 1 }] }],
    };
    expect(assembleMeshes(tree, ACCESSORS, [], quietLogger()).geometry.get('tri')?.metadata).toEqual({ units: 'mm' });
  });

  test('names primitives, unnamed meshes and repeated names', () => {
    const primitive = { attributes: { POSITION: 0 }, indices: 1 };
    const tree: GltfDocument = {
      meshes: [
        { name: 'multi', primitives: [primitive, primitive] },
        { primitives: [primitive] },
        { name: 'box', primitives: [primitive] },
        { name: 'box', primitives: [primitive] },
      ],
    };
    const { geometry, meshNames } = assembleMeshes(tree, ACCESSORS, [], quietLogger());

    expect(meshNames).toEqual([['multi_0', 'multi_1'], ['GLTF_geometry'], ['box'], ['box_3']]);
    expect([...geometry.keys()]).toEqual(['multi_0', 'multi_1', 'GLTF_geometry', 'box', 'box_3']);
  });
});

describe('flipTexcoords', () => {
  test('maps v to 1 - v and leaves u', () => {
    expect(Array.from(flipTexcoords(Float32Array.from([0.25, 0, 0.5, 1])))).toEqual([0.25, 1, 0.5, 0]);
  });
});
