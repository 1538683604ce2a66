/**
 * Normal Utilities
 */

/**
 * Area-weighted smooth vertex normals for an indexed triangle mesh
 */
export function computeSmoothNormals(
  positions: ArrayLike<number>,
  faces: ArrayLike<number>
): Float32Array {
  const normals = new Float32Array(positions.length);
  const vertexCount = (positions.length / 3) | 0;

  for (let i = 0; i + 2 < faces.length; i += 3) {
    const a = faces[i] * 3;
    const b = faces[i + 1] * 3;
    const c = faces[i + 2] * 3;

    const e1x = positions[b] - positions[a];
    const e1y = positions[b + 1] - positions[a + 1];
    const e1z = positions[b + 2] - positions[a + 2];
    const e2x = positions[c] - positions[a];
    const e2y = positions[c + 1] - positions[a + 1];
    const e2z = positions[c + 2] - positions[a + 2];

    // Unnormalised cross product, so larger faces weigh more
    const nx = e1y * e2z - e1z * e2y;
    const ny = e1z * e2x - e1x * e2z;
    const nz = e1x * e2y - e1y * e2x;

    for (const base of [a, b, c]) {
      normals[base] += nx;
      normals[base + 1] += ny;
      normals[base + 2] += nz;
    }
  }

  for (let i = 0; i < vertexCount; i++) {
    const nx = normals[i * 3];
    const ny = normals[i * 3 + 1];
    const nz = normals[i * 3 + 2];
    const invLength = 1 / (Math.hypot(nx, ny, nz) || 1);
    normals[i * 3] = nx * invLength;
    normals[i * 3 + 1] = ny * invLength;
    normals[i * 3 + 2] = nz * invLength;
  }

  return normals;
}
