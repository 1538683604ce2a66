/**
 * Geometry Appender
 *
 * Writes one scene geometry into the document builder: accessors over
 * freshly encoded buffer items, the mesh record, and a material when the
 * geometry needs one.
 */

import { ATTRIBUTE_NAMES, COMPONENT_TYPE, PRIMITIVE_MODE } from '../../constants/gltf';
import { assertInvariant } from '../../errors';
import type { ColorVisualSource, PathSource, TriangleMeshSource } from '../../interfaces';
import type { GltfMesh, GltfPrimitive } from '../../schemas/gltf-document';
import { computeBounds, encodeComponents, maxValue } from '../../utils/byte-utils';
import { computeSmoothNormals } from '../../utils/normal-utils';
import { DocumentBuilder } from '../shared/document-builder';
import { defaultPathMaterial, meshToMaterial } from './material-mapper';

const PATH_MATERIAL_KEY = 'path';

export interface AppendOptions {
  includeNormals: boolean;
}

/**
 * Appends a float32 VEC3 accessor with float32-rounded bounds.
 * Bounds are left out for an empty array.
 */
function appendVec3(builder: DocumentBuilder, values: ArrayLike<number>, owner: string): number {
  const data = Float32Array.from(values);
  return builder.addAccessor(
    {
      componentType: COMPONENT_TYPE.FLOAT,
      type: 'VEC3',
      byteOffset: 0,
      count: data.length / 3,
      ...(data.length > 0 ? computeBounds(data, 3) : {}),
    },
    encodeComponents(data, COMPONENT_TYPE.FLOAT),
    owner
  );
}

function resolveColorVisual(mesh: TriangleMeshSource): ColorVisualSource {
  return mesh.visual.kind === 'texture' ? mesh.visual.toColor() : mesh.visual;
}

/**
 * Appends a triangle mesh and returns its mesh index
 */
export function appendTriangleMesh(
  builder: DocumentBuilder,
  name: string,
  mesh: TriangleMeshSource,
  options: AppendOptions
): number {
  const faceCount = mesh.faces.length / 3;
  const vertexCount = mesh.vertices.length / 3;

  const indices = builder.addAccessor(
    {
      componentType: COMPONENT_TYPE.UNSIGNED_INT,
      type: 'SCALAR',
      count: faceCount * 3,
      min: [0],
      max: [maxValue(mesh.faces)],
    },
    encodeComponents(mesh.faces, COMPONENT_TYPE.UNSIGNED_INT),
    name
  );

  const primitive: GltfPrimitive = {
    attributes: { [ATTRIBUTE_NAMES.POSITION]: appendVec3(builder, mesh.vertices, name) },
    indices,
    mode: PRIMITIVE_MODE.TRIANGLES,
  };

  const visual = resolveColorVisual(mesh);
  if (visual.kind !== null) {
    const colors = Uint8Array.from(visual.vertexColors);
    assertInvariant(colors.length === vertexCount * 4, 'vertex colors must be RGBA per vertex', {
      geometry: name,
      colorLength: colors.length,
      vertexCount
    });
    primitive.attributes[ATTRIBUTE_NAMES.COLOR] = builder.addAccessor(
      {
        componentType: COMPONENT_TYPE.UNSIGNED_BYTE,
        normalized: true,
        type: 'VEC4',
        count: vertexCount,
      },
      colors,
      name
    );
  } else {
    primitive.material = builder.addMaterial(meshToMaterial(visual.mainColor));
  }

  if (options.includeNormals) {
    const normals = mesh.vertexNormals ?? computeSmoothNormals(mesh.vertices, mesh.faces);
    primitive.attributes[ATTRIBUTE_NAMES.NORMAL] = appendVec3(builder, normals, name);
  }

  return builder.addMesh(withUnits({ name, primitives: [primitive] }, mesh.units));
}

/**
 * Appends a path as a GL_LINES primitive and returns its mesh index
 */
export function appendPath(builder: DocumentBuilder, name: string, path: PathSource): number {
  const { vertices } = path.toVertexList();

  const primitive: GltfPrimitive = {
    attributes: { [ATTRIBUTE_NAMES.POSITION]: appendVec3(builder, vertices, name) },
    mode: PRIMITIVE_MODE.LINES,
    material: builder.addSharedMaterial(PATH_MATERIAL_KEY, defaultPathMaterial),
  };

  return builder.addMesh(withUnits({ name, primitives: [primitive] }, path.units));
}

function withUnits(mesh: GltfMesh, units: string | null | undefined): GltfMesh {
  return units ? { ...mesh, extras: { units } } : mesh;
}
