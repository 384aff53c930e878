/**
 * Entity Validators
 *
 * Zod schemas for entity creation, queries and edits.
 */

import { z } from "zod";
import { ENTITY_KINDS, SKETCH_PLANES } from "@cadbranch/core";
import { callSchema, entityIdField, workspaceIdField, xySchema } from "./common.js";

// ============================================================================
// Geometry
// ============================================================================

export const pointGeometrySchema = z.object({
  kind: z.literal("point"),
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
});

export const lineGeometrySchema = z.object({
  kind: z.literal("line"),
  start: xySchema,
  end: xySchema,
});

export const circleGeometrySchema = z.object({
  kind: z.literal("circle"),
  center: xySchema,
  radius: z.number(),
});

export const arcGeometrySchema = z.object({
  kind: z.literal("arc"),
  center: xySchema,
  radius: z.number(),
  start_angle: z.number(),
  end_angle: z.number(),
});

export const sketchGeometrySchema = z.object({
  kind: z.literal("sketch"),
  plane: z.enum(SKETCH_PLANES),
});

export const solidGeometrySchema = z.object({
  kind: z.literal("solid"),
  operation: z.literal("extrude"),
  distance: z.number(),
});

export const geometrySchema = z.discriminatedUnion("kind", [
  pointGeometrySchema,
  lineGeometrySchema,
  circleGeometrySchema,
  arcGeometrySchema,
  sketchGeometrySchema,
  solidGeometrySchema,
]);

// ============================================================================
// Creation Schemas
// ============================================================================

const inSketch = {
  sketch_id: entityIdField.optional(),
};

export const createPointSchema = callSchema.extend({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
  ...inSketch,
});

export const createLineSchema = callSchema.extend({
  start: xySchema,
  end: xySchema,
  ...inSketch,
});

export const createCircleSchema = callSchema.extend({
  center: xySchema,
  radius: z.number(),
  ...inSketch,
});

export const createArcSchema = callSchema.extend({
  center: xySchema,
  radius: z.number(),
  start_angle: z.number(),
  end_angle: z.number(),
  ...inSketch,
});

export const createSketchSchema = callSchema.extend({
  plane: z.enum(SKETCH_PLANES).default("xy"),
});

export const extrudeSchema = callSchema.extend({
  sketch_id: entityIdField,
  distance: z.number(),
});

// ============================================================================
// Query Schemas
// ============================================================================

export const queryEntitySchema = z.object({
  workspace_id: workspaceIdField,
  entity_id: entityIdField,
});

export const listEntitiesSchema = z.object({
  workspace_id: workspaceIdField,
  kind: z.enum(ENTITY_KINDS).optional(),
  parent_id: entityIdField.optional(),
});

// ============================================================================
// Mutation Schemas
// ============================================================================

export const updateEntitySchema = callSchema.extend({
  entity_id: entityIdField,
  geometry: geometrySchema,
});

export const deleteEntitySchema = callSchema.extend({
  entity_id: entityIdField,
});

// ============================================================================
// Types
// ============================================================================

export type GeometryInput = z.infer<typeof geometrySchema>;
export type CreatePointInput = z.infer<typeof createPointSchema>;
export type CreateLineInput = z.infer<typeof createLineSchema>;
export type CreateCircleInput = z.infer<typeof createCircleSchema>;
export type CreateArcInput = z.infer<typeof createArcSchema>;
export type CreateSketchInput = z.infer<typeof createSketchSchema>;
export type ExtrudeInput = z.infer<typeof extrudeSchema>;
export type QueryEntityInput = z.infer<typeof queryEntitySchema>;
export type ListEntitiesInput = z.infer<typeof listEntitiesSchema>;
export type UpdateEntityInput = z.infer<typeof updateEntitySchema>;
export type DeleteEntityInput = z.infer<typeof deleteEntitySchema>;
