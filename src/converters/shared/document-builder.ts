/**
 * Document Builder
 *
 * Append-only construction of the glTF document tree. Every append returns
 * the index it assigned, so references are always valid at the moment
 * they are written.
 */

import type { GltfAccessor, GltfDocument, GltfMaterial, GltfMesh } from '../../schemas/gltf-document';
import { bytePad } from '../../utils/byte-utils';

/**
 * One aligned chunk of binary data, owned by a geometry
 */
export interface BufferItem {
  data: Uint8Array;
  owner: string;
}

/**
 * Accessor fields supplied by callers; `bufferView` is assigned here
 */
export type AccessorDescriptor = Omit<GltfAccessor, 'bufferView'>;

/**
 * Result of a build
 */
export interface BuiltStructure {
  tree: GltfDocument;
  bufferItems: BufferItem[];
}

export class DocumentBuilder {
  private readonly accessors: GltfAccessor[] = [];
  private readonly meshes: GltfMesh[] = [];
  private readonly materials: GltfMaterial[] = [];
  private readonly bufferItems: BufferItem[] = [];
  private readonly sharedMaterials = new Map<string, number>();

  /**
   * Appends an accessor over `data`. The data becomes the next buffer item,
   * so the accessor's bufferView index equals the item's position.
   */
  addAccessor(accessor: AccessorDescriptor, data: Uint8Array, owner: string): number {
    const bufferView = this.bufferItems.length;
    this.bufferItems.push({ data: bytePad(data), owner });
    this.accessors.push({ bufferView, ...accessor });
    return this.accessors.length - 1;
  }

  addMesh(mesh: GltfMesh): number {
    this.meshes.push(mesh);
    return this.meshes.length - 1;
  }

  addMaterial(material: GltfMaterial): number {
    this.materials.push(material);
    return this.materials.length - 1;
  }

  /**
   * Appends a material once per key and reuses its index afterwards
   */
  addSharedMaterial(key: string, create: () => GltfMaterial): number {
    const existing = this.sharedMaterials.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.addMaterial(create());
    this.sharedMaterials.set(key, index);
    return index;
  }

  /**
   * Merges the appended records over `base`. The `materials` key is
   * omitted entirely when nothing appended a material.
   */
  build(base: GltfDocument): BuiltStructure {
    const tree: GltfDocument = {
      ...base,
      accessors: [...this.accessors],
      meshes: [...this.meshes],
    };

    if (this.materials.length > 0) {
      tree.materials = [...this.materials];
    } else {
      delete tree.materials;
    }

    return { tree, bufferItems: [...this.bufferItems] };
  }
}
