/**
 * Graph Reconstructor
 *
 * Rebuilds the transform graph as a list of parent -> child edges from the
 * index-based node hierarchy. Every geometry instance gets its own frame.
 */

import { ERROR_MESSAGES, ERROR_STAGES } from '../../constants/errors';
import { GltfErrorFactory } from '../../errors';
import type { GraphEdge, Matrix4 } from '../../interfaces';
import type { GltfDocument, GltfNode } from '../../schemas/gltf-document';
import { composeTrs, fromColumnMajor, identityMatrix } from '../../utils/matrix-utils';
import { FrameNameGenerator } from '../../utils/name-utils';

export interface ReconstructOptions {
  baseFrame: string;
  deterministicNames: boolean;
}

export interface ReconstructedGraph {
  graph: GraphEdge[];
  /** preferred base frame, or a minted name when a node already uses it */
  baseFrame: string;
}

/**
 * Display names for every node: the declared name, else the index.
 * Repeated names get `_<index>` appended.
 */
export function nodeDisplayNames(nodes: readonly GltfNode[]): string[] {
  const used = new Set<string>();
  return nodes.map((node, index) => {
    let name = node.name ?? String(index);
    while (used.has(name)) {
      name = `${name}_${index}`;
    }
    used.add(name);
    return name;
  });
}

/**
 * Local transform of a node as a row-major matrix
 */
export function nodeMatrix(node: GltfNode): Matrix4 {
  if (node.matrix) {
    return fromColumnMajor(node.matrix);
  }
  if (node.translation || node.rotation || node.scale) {
    return composeTrs(node.translation, node.rotation, node.scale);
  }
  return identityMatrix();
}

/**
 * Root nodes of the default scene; without scenes, every node that is
 * nobody's child
 */
export function sceneRoots(tree: GltfDocument): number[] {
  const scenes = tree.scenes ?? [];
  if (scenes.length === 0) {
    const children = new Set((tree.nodes ?? []).flatMap(node => node.children ?? []));
    return (tree.nodes ?? []).map((_, index) => index).filter(index => !children.has(index));
  }

  const sceneIndex = tree.scene ?? 0;
  const scene = scenes[sceneIndex];
  if (!scene) {
    throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_REFERENCE, ERROR_STAGES.GRAPH, { scene: sceneIndex });
  }
  return scene.nodes ?? [];
}

/**
 * Converts the node hierarchy into graph edges.
 * `meshNames[meshIndex]` lists the geometry names assembled from that mesh.
 */
export function reconstructGraph(
  tree: GltfDocument,
  meshNames: readonly (readonly string[])[],
  options: ReconstructOptions
): ReconstructedGraph {
  const nodes = tree.nodes ?? [];
  const names = nodeDisplayNames(nodes);

  const frames = new FrameNameGenerator(options.deterministicNames);
  names.forEach(name => frames.reserve(name));

  let baseFrame = options.baseFrame;
  if (frames.has(baseFrame)) {
    baseFrame = frames.mintNumericName();
  } else {
    frames.reserve(baseFrame);
  }

  const checkNode = (index: number, context: Record<string, unknown>): GltfNode => {
    const node = nodes[index];
    if (!node) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_REFERENCE, ERROR_STAGES.GRAPH, { node: index, ...context });
    }
    return node;
  };

  // LIFO worklist of (parent frame, node index)
  const queue: Array<[string, number]> = sceneRoots(tree).map(root => {
    checkNode(root, { root: true });
    return [baseFrame, root];
  });

  const visited = new Set<number>();
  const graph: GraphEdge[] = [];

  while (queue.length > 0) {
    const entry = queue.pop();
    if (!entry) break;
    const [parent, index] = entry;
    const node = checkNode(index, { parent });

    if (visited.has(index)) {
      throw GltfErrorFactory.formatError('node is reachable more than once', ERROR_STAGES.GRAPH, { node: index });
    }
    visited.add(index);

    const frame = names[index];
    for (const child of node.children ?? []) {
      checkNode(child, { parent: frame });
      queue.push([frame, child]);
    }

    const matrix = nodeMatrix(node);
    graph.push({ frameFrom: parent, frameTo: frame, matrix });

    if (node.mesh === undefined) continue;

    const geometries = meshNames[node.mesh];
    if (!geometries) {
      throw GltfErrorFactory.formatError(ERROR_MESSAGES.INVALID_REFERENCE, ERROR_STAGES.GRAPH, {
        node: index,
        mesh: node.mesh
      });
    }

    // Instance edges hang off the same parent with the node's own matrix
    for (const geometry of geometries) {
      graph.push({
        frameFrom: parent,
        frameTo: frames.mintInstanceName(geometry),
        matrix,
        geometry,
      });
    }
  }

  return { graph, baseFrame };
}
