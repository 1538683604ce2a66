/**
 * Public Types
 *
 * Re-exports of the schema-inferred and collaborator types.
 */

export type {
  CodecConfig,
  CodecConfigInput,
  ExportSettings,
  ImportSettings,
  GltfDocument,
  GltfAccessor,
  GltfBuffer,
  GltfBufferView,
  GltfMaterial,
  GltfMesh,
  GltfNode,
  GltfPrimitive,
  GltfScene
} from './schemas';

export type {
  BitmapLike,
  ColorVisualSource,
  GeometryKwargs,
  GeometrySource,
  GltfGraphPayload,
  GraphEdge,
  ImageDecoder,
  Matrix4,
  PathSource,
  PathVertexList,
  Rgba8,
  SceneGraphSource,
  SceneKwargs,
  SceneSource,
  TextureVisualSource,
  TexturedVisualKwargs,
  TriangleMeshSource
} from './interfaces';
