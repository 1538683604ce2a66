/**
 * Matrix Utilities
 *
 * Graph edges carry row-major 4x4 matrices; glTF nodes store column-major
 * arrays of 16 floats.
 */

import type { Matrix4 } from '../interfaces';

/**
 * Row-major identity matrix
 */
export function identityMatrix(): Matrix4 {
  return [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1],
  ];
}

/**
 * Converts a column-major glTF matrix into a row-major matrix (transpose)
 */
export function fromColumnMajor(m: ArrayLike<number>): Matrix4 {
  return [
    [m[0], m[4], m[8], m[12]],
    [m[1], m[5], m[9], m[13]],
    [m[2], m[6], m[10], m[14]],
    [m[3], m[7], m[11], m[15]],
  ];
}

/**
 * Flattens a row-major matrix into glTF's column-major array
 */
export function toColumnMajor(matrix: Matrix4): number[] {
  const out: number[] = [];
  for (let column = 0; column < 4; column++) {
    for (let row = 0; row < 4; row++) {
      out.push(matrix[row][column]);
    }
  }
  return out;
}

/**
 * Checks for an exact identity matrix
 */
export function isIdentityMatrix(matrix: Matrix4): boolean {
  for (let row = 0; row < 4; row++) {
    for (let column = 0; column < 4; column++) {
      if (matrix[row][column] !== (row === column ? 1 : 0)) return false;
    }
  }
  return true;
}

/**
 * Builds a row-major matrix from translation, rotation (quaternion) and scale.
 * Quaternion format: (x, y, z, w) as stored by glTF.
 * Result is T * R * S.
 */
export function composeTrs(
  translation: readonly [number, number, number] = [0, 0, 0],
  rotation: readonly [number, number, number, number] = [0, 0, 0, 1],
  scale: readonly [number, number, number] = [1, 1, 1]
): Matrix4 {
  const [qx, qy, qz, qw] = rotation;
  const [sx, sy, sz] = scale;
  const [tx, ty, tz] = translation;

  const xx = qx * qx;
  const yy = qy * qy;
  const zz = qz * qz;
  const xy = qx * qy;
  const xz = qx * qz;
  const yz = qy * qz;
  const wx = qw * qx;
  const wy = qw * qy;
  const wz = qw * qz;

  // Rotation columns scaled by the matching scale axis
  return [
    [(1 - 2 * (yy + zz)) * sx, 2 * (xy - wz) * sy, 2 * (xz + wy) * sz, tx],
    [2 * (xy + wz) * sx, (1 - 2 * (xx + zz)) * sy, 2 * (yz - wx) * sz, ty],
    [2 * (xz - wy) * sx, 2 * (yz + wx) * sy, (1 - 2 * (xx + yy)) * sz, tz],
    [0, 0, 0, 1],
  ];
}
