/**
 * Base Schemas
 *
 * Common validation schemas shared by the document and config schemas.
 */

import { z } from 'zod';
import { ACCESSOR_TYPES, COMPONENT_TYPE } from '../constants/gltf';

/**
 * Zero-based index into a sibling array
 */
export const IndexSchema = z.number().int().nonnegative();

/**
 * Accessor componentType code
 */
export const ComponentTypeSchema = z.nativeEnum(COMPONENT_TYPE);

/**
 * Accessor type string
 */
export const AccessorTypeSchema = z.enum(ACCESSOR_TYPES);

/**
 * Column-major 4x4 matrix as stored on nodes
 */
export const ColumnMajorMatrixSchema = z.array(z.number()).length(16);

export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

export const Vec4Schema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * Free-form extras/extensions object
 */
export const ExtrasSchema = z.record(z.string(), z.unknown());
