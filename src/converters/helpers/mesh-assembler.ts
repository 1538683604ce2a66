/**
 * Mesh Assembler
 *
 * Turns resolved accessors into per-primitive geometry construction
 * arguments. Only triangle primitives are assembled.
 */

import { NAMING } from '../../constants/config';
import { ERROR_MESSAGES, ERROR_STAGES, DEGRADATIONS } from '../../constants/errors';
import { ATTRIBUTE_NAMES, COMPONENT_TYPE, PRIMITIVE_MODE } from '../../constants/gltf';
import { GltfErrorFactory } from '../../errors';
import type { GeometryKwargs } from '../../interfaces';
import type { GltfDocument, GltfPrimitive } from '../../schemas/gltf-document';
import { Logger } from '../../utils/logger';
import type { ResolvedAccessor } from './accessor-resolver';
import type { PbrMaterial } from './material-mapper';

/**
 * Assembled geometry plus, per mesh index, the names generated for it
 */
export interface AssembledMeshes {
  geometry: Map<string, GeometryKwargs>;
  meshNames: string[][];
}

/**
 * Maximum value of normalized integer component types
 */
const NORMALIZED_MAX: Partial<Record<number, number>> = {
  [COMPONENT_TYPE.BYTE]: 127,
  [COMPONENT_TYPE.UNSIGNED_BYTE]: 255,
  [COMPONENT_TYPE.SHORT]: 32767,
  [COMPONENT_TYPE.UNSIGNED_SHORT]: 65535,
};

/**
 * Accessor values as floats, dequantizing normalized integers
 */
function toFloat32(accessor: ResolvedAccessor): Float32Array {
  const max = accessor.normalized ? NORMALIZED_MAX[accessor.componentType] : undefined;
  if (max === undefined) {
    return Float32Array.from(accessor.array);
  }
  return Float32Array.from(accessor.array, value => Math.max(value / max, -1));
}

/**
 * Vertex colors as RGBA bytes; RGB colors get an opaque alpha
 */
function toRgba8(accessor: ResolvedAccessor, vertexCount: number): Uint8Array {
  const width = accessor.shape[1] ?? 1;
  const values = accessor.componentType === COMPONENT_TYPE.UNSIGNED_BYTE
    ? accessor.array
    : toFloat32(accessor).map(value => Math.round(value * 255));

  const rgba = new Uint8Array(vertexCount * 4);
  for (let vertex = 0; vertex < vertexCount; vertex++) {
    for (let channel = 0; channel < 4; channel++) {
      rgba[vertex * 4 + channel] = channel < width ? values[vertex * width + channel] : 255;
    }
  }
  return rgba;
}

function attribute(
  primitive: GltfPrimitive,
  name: string,
  accessors: readonly ResolvedAccessor[],
  meshIndex: number
): ResolvedAccessor | undefined {
  const index = primitive.attributes[name];
  if (index === undefined) return undefined;
  const accessor = accessors[index];
  if (!accessor) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_REFERENCE, ERROR_STAGES.MESHES, {
      mesh: meshIndex,
      attribute: name,
      accessor: index
    });
  }
  return accessor;
}

function readFaces(
  primitive: GltfPrimitive,
  accessors: readonly ResolvedAccessor[],
  vertexCount: number,
  meshIndex: number
): Uint32Array {
  if (primitive.indices === undefined) {
    if (vertexCount % 3 !== 0) {
      throw GltfErrorFactory.formatError('non-indexed triangle primitive has a partial triangle', ERROR_STAGES.MESHES, {
        mesh: meshIndex,
        vertexCount
      });
    }
    return Uint32Array.from({ length: vertexCount }, (_, i) => i);
  }

  const indices = accessors[primitive.indices];
  if (!indices) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_REFERENCE, ERROR_STAGES.MESHES, {
      mesh: meshIndex,
      accessor: primitive.indices
    });
  }
  if (indices.array.length % 3 !== 0) {
    throw GltfErrorFactory.formatError('triangle indices are not a multiple of 3', ERROR_STAGES.MESHES, {
      mesh: meshIndex,
      indexCount: indices.array.length
    });
  }
  return Uint32Array.from(indices.array);
}

/**
 * Flips v so the origin moves from top-left to bottom-left
 */
export function flipTexcoords(uv: Float32Array): Float32Array {
  const flipped = Float32Array.from(uv);
  for (let i = 1; i < flipped.length; i += 2) {
    flipped[i] = 1 - flipped[i];
  }
  return flipped;
}

/**
 * Returns `name`, or `name` suffixed with the mesh index until it is free
 */
function claimName(name: string, meshIndex: number, taken: ReadonlyMap<string, unknown>): string {
  let candidate = name;
  while (taken.has(candidate)) {
    candidate = `${candidate}_${meshIndex}`;
  }
  return candidate;
}

/**
 * Builds geometry for every triangle primitive of every mesh
 */
export function assembleMeshes(
  tree: GltfDocument,
  accessors: readonly ResolvedAccessor[],
  materials: readonly PbrMaterial[],
  logger: Logger
): AssembledMeshes {
  const geometry = new Map<string, GeometryKwargs>();
  const meshNames: string[][] = [];

  (tree.meshes ?? []).forEach((mesh, meshIndex) => {
    const names: string[] = [];
    meshNames.push(names);

    mesh.primitives.forEach((primitive, primitiveIndex) => {
      const mode = primitive.mode ?? PRIMITIVE_MODE.TRIANGLES;
      if (mode !== PRIMITIVE_MODE.TRIANGLES) {
        return;
      }

      const position = attribute(primitive, ATTRIBUTE_NAMES.POSITION, accessors, meshIndex);
      if (!position) {
        throw GltfErrorFactory.formatError('primitive has no POSITION attribute', ERROR_STAGES.MESHES, {
          mesh: meshIndex,
          primitive: primitiveIndex
        });
      }

      const vertices = toFloat32(position);
      const vertexCount = position.shape[0];
      const kwargs: GeometryKwargs = {
        vertices,
        faces: readFaces(primitive, accessors, vertexCount, meshIndex),
        metadata: {},
      };

      const units = mesh.extras?.['units'];
      if (typeof units === 'string') {
        kwargs.metadata.units = units;
      }

      const colors = attribute(primitive, ATTRIBUTE_NAMES.COLOR, accessors, meshIndex);
      if (colors) {
        kwargs.vertexColors = toRgba8(colors, vertexCount);
      }

      const normals = attribute(primitive, ATTRIBUTE_NAMES.NORMAL, accessors, meshIndex);
      if (normals) {
        kwargs.vertexNormals = toFloat32(normals);
      }

      const texcoords = attribute(primitive, ATTRIBUTE_NAMES.TEXCOORD, accessors, meshIndex);
      if (texcoords) {
        if (primitive.material === undefined) {
          logger.warn('Texture coordinates without a material are ignored', {
            degradation: DEGRADATIONS.TEXCOORD_WITHOUT_MATERIAL,
            mesh: meshIndex,
            primitive: primitiveIndex
          });
        } else {
          const material = materials[primitive.material];
          if (material) {
            kwargs.visual = { uv: flipTexcoords(toFloat32(texcoords)), material };
          } else {
            logger.debug('Material not resolved, loading untextured geometry', {
              degradation: DEGRADATIONS.UNRESOLVED_MATERIAL,
              mesh: meshIndex,
              material: primitive.material
            });
          }
        }
      }

      const baseName = mesh.name ?? NAMING.DEFAULT_GEOMETRY;
      const name = claimName(
        mesh.primitives.length > 1 ? `${baseName}_${primitiveIndex}` : baseName,
        meshIndex,
        geometry
      );
      geometry.set(name, kwargs);
      names.push(name);
    });
  });

  return { geometry, meshNames };
}
