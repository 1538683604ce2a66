/**
 * Edge List Graph
 *
 * In-memory transform graph that flattens itself into glTF nodes: the base
 * frame becomes node 0, every other frame one node in first-seen order.
 */

import type { GltfNode } from '../../schemas/gltf-document';
import type { GltfGraphPayload, GraphEdge, SceneGraphSource } from '../../interfaces';
import { assertInvariant } from '../../errors';
import { isIdentityMatrix, toColumnMajor } from '../../utils/matrix-utils';

export class EdgeListGraph implements SceneGraphSource {
  private readonly edges: GraphEdge[] = [];

  constructor(readonly baseFrame: string, edges: readonly GraphEdge[] = []) {
    edges.forEach(edge => this.addEdge(edge));
  }

  /**
   * Adds a parent -> child edge. A frame has at most one parent.
   */
  addEdge(edge: GraphEdge): this {
    assertInvariant(
      edge.frameTo !== this.baseFrame && !this.edges.some(existing => existing.frameTo === edge.frameTo),
      'frame already has a parent',
      { frameTo: edge.frameTo }
    );
    this.edges.push(edge);
    return this;
  }

  toGltf(meshIndex: ReadonlyMap<string, number>): GltfGraphPayload {
    const nodes: GltfNode[] = [{ name: this.baseFrame }];
    const nodeIndex = new Map<string, number>([[this.baseFrame, 0]]);

    const indexOf = (frame: string): number => {
      let index = nodeIndex.get(frame);
      if (index === undefined) {
        index = nodes.length;
        nodes.push({ name: frame });
        nodeIndex.set(frame, index);
      }
      return index;
    };

    const hasParent = new Set<number>();
    for (const edge of this.edges) {
      const parent = nodes[indexOf(edge.frameFrom)];
      const childIndex = indexOf(edge.frameTo);
      const child = nodes[childIndex];
      hasParent.add(childIndex);

      parent.children = [...(parent.children ?? []), childIndex];
      if (!isIdentityMatrix(edge.matrix)) {
        child.matrix = toColumnMajor(edge.matrix);
      }
      if (edge.geometry !== undefined) {
        const mesh = meshIndex.get(edge.geometry);
        assertInvariant(mesh !== undefined, 'edge references a geometry that is not in the scene', {
          geometry: edge.geometry
        });
        child.mesh = mesh;
      }
    }

    // frames never given a parent are extra scene roots
    const roots = nodes.map((_, index) => index).filter(index => index === 0 || !hasParent.has(index));
    return { nodes, scenes: [{ nodes: roots }], scene: 0 };
  }
}
