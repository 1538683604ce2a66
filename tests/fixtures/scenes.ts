/**
 * Scene fixtures shared by the codec tests
 */

import { EdgeListGraph } from '../../src/converters/helpers/edge-list-graph';
import type {
  BitmapLike,
  GeometrySource,
  GraphEdge,
  ImageDecoder,
  PathSource,
  Rgba8,
  SceneSource,
  TriangleMeshSource
} from '../../src/interfaces';
import { identityMatrix } from '../../src/utils/matrix-utils';
import { createLogger, LogLevel } from '../../src/utils/logger';

/** Unit quad in the z = 0 plane, with values that float32 truncates */
export const QUAD_VERTICES = [0, 0, 0, 0.1, 0, 0, 0.1, 0.2, 0, 0, 0.2, 0];
export const QUAD_FACES = [0, 1, 2, 0, 2, 3];
export const QUAD_COLORS = [255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255, 255, 255, 255, 128];

export interface QuadOptions {
  colored?: boolean;
  mainColor?: Rgba8;
  units?: string;
}

export function quadMesh(options: QuadOptions = {}): TriangleMeshSource {
  return {
    type: 'mesh',
    vertices: QUAD_VERTICES,
    faces: QUAD_FACES,
    units: options.units,
    visual: {
      kind: options.colored === false ? null : 'vertex',
      vertexColors: options.colored === false ? [] : QUAD_COLORS,
      mainColor: options.mainColor ?? [255, 128, 0, 255],
    },
  };
}

/**
 * Mesh without vertices or faces
 */
export function emptyMesh(): TriangleMeshSource {
  return {
    type: 'mesh',
    vertices: [],
    faces: [],
    visual: { kind: null, vertexColors: [], mainColor: [255, 255, 255, 255] },
  };
}

export function linePath(units?: string): PathSource {
  return {
    type: 'path',
    units,
    toVertexList: () => ({ count: 2, mode: 'lines', vertices: [0, 0, 0, 1, 2, 3] }),
  };
}

/**
 * Scene with every geometry placed once under the base frame
 */
export function sceneOf(geometry: Array<[string, GeometrySource]>, baseFrame = 'world'): SceneSource {
  const edges: GraphEdge[] = geometry.map(([name]) => ({
    frameFrom: baseFrame,
    frameTo: name,
    matrix: identityMatrix(),
    geometry: name,
  }));
  return { geometry: new Map(geometry), graph: new EdgeListGraph(baseFrame, edges) };
}

/**
 * Logger that prints only errors
 */
export function quietLogger() {
  return createLogger({ level: LogLevel.ERROR, prefix: 'GltfCodec-Test' });
}

/**
 * Decoder returning a 1x1 bitmap that wraps the encoded bytes
 */
export const echoDecoder: ImageDecoder = {
  decode(bytes: Uint8Array): BitmapLike {
    return { width: 1, height: 1, data: bytes };
  },
};
