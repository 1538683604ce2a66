/**
 * Core Interfaces for the glTF Scene Codec
 *
 * Shapes of the external collaborators the codec reads from on export and
 * the scene-construction payload it produces on import.
 */

import type { GltfNode, GltfScene } from '../schemas/gltf-document';
import type { PbrMaterial } from '../converters/helpers/material-mapper';

export type Row4 = [number, number, number, number];

/**
 * Row-major 4x4 transform
 */
export type Matrix4 = [Row4, Row4, Row4, Row4];

/**
 * RGBA color, 0-255 per channel
 */
export type Rgba8 = readonly [number, number, number, number];

/**
 * Per-vertex or per-face color visuals
 */
export interface ColorVisualSource {
  /** null when the mesh carries no explicit colors */
  readonly kind: 'vertex' | 'face' | null;
  /** RGBA bytes, four per vertex */
  readonly vertexColors: ArrayLike<number>;
  /** Most common color of the mesh */
  readonly mainColor: Rgba8;
}

/**
 * UV-mapped visuals; exported through their color approximation
 */
export interface TextureVisualSource {
  readonly kind: 'texture';
  readonly uv: ArrayLike<number>;
  toColor(): ColorVisualSource;
}

export type MeshVisualSource = ColorVisualSource | TextureVisualSource;

/**
 * Indexed triangle mesh
 */
export interface TriangleMeshSource {
  readonly type: 'mesh';
  /** xyz per vertex */
  readonly vertices: ArrayLike<number>;
  /** three vertex indices per face */
  readonly faces: ArrayLike<number>;
  readonly visual: MeshVisualSource;
  readonly units?: string | null;
  /** xyz per vertex */
  readonly vertexNormals?: ArrayLike<number>;
}

/**
 * Line-list rendering of a path
 */
export interface PathVertexList {
  /** number of vertices */
  readonly count: number;
  readonly mode: 'lines';
  /** xyz per vertex, two vertices per segment */
  readonly vertices: ArrayLike<number>;
}

/**
 * 2D or 3D path exported as GL_LINES
 */
export interface PathSource {
  readonly type: 'path';
  readonly units?: string | null;
  toVertexList(): PathVertexList;
}

export type GeometrySource = TriangleMeshSource | PathSource;

/**
 * Node and scene arrays contributed by the transform graph
 */
export interface GltfGraphPayload {
  nodes: GltfNode[];
  scenes?: GltfScene[];
  scene?: number;
}

/**
 * Transform graph able to flatten itself into glTF nodes
 */
export interface SceneGraphSource {
  toGltf(meshIndex: ReadonlyMap<string, number>): GltfGraphPayload;
}

/**
 * Scene exported by the codec
 */
export interface SceneSource {
  /** ordered geometry name -> geometry */
  readonly geometry: ReadonlyMap<string, GeometrySource>;
  readonly graph: SceneGraphSource;
}

/**
 * Decoded image
 */
export interface BitmapLike {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
}

/**
 * Image decoding capability injected into imports
 */
export interface ImageDecoder {
  decode(bytes: Uint8Array, mimeType?: string): BitmapLike;
}

/**
 * One edge of the transform graph
 */
export interface GraphEdge {
  frameFrom: string;
  frameTo: string;
  matrix: Matrix4;
  geometry?: string;
}

/**
 * UV-mapped appearance of an imported geometry
 */
export interface TexturedVisualKwargs {
  /** uv per vertex, v already flipped to a bottom-left origin */
  uv: Float32Array;
  material: PbrMaterial;
}

/**
 * Construction arguments for one imported geometry
 */
export interface GeometryKwargs {
  /** xyz per vertex */
  vertices: Float32Array;
  /** three vertex indices per triangle */
  faces: Uint32Array;
  metadata: { units?: string };
  /** RGBA bytes, four per vertex */
  vertexColors?: Uint8Array;
  /** xyz per vertex */
  vertexNormals?: Float32Array;
  visual?: TexturedVisualKwargs;
}

/**
 * Construction arguments for an imported scene
 */
export interface SceneKwargs {
  kind: 'Scene';
  /** ordered geometry name -> geometry */
  geometry: Map<string, GeometryKwargs>;
  graph: GraphEdge[];
  baseFrame: string;
}
