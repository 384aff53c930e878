/**
 * Convert wire geometry (snake_case) into core geometry
 */

import type { EntityGeometry } from "@cadbranch/core";
import type { GeometryInput } from "../validators/index.js";

export function toGeometry(input: GeometryInput): EntityGeometry {
  switch (input.kind) {
    case "point":
      return input.z === undefined
        ? { kind: "point", x: input.x, y: input.y }
        : { kind: "point", x: input.x, y: input.y, z: input.z };
    case "line":
      return { kind: "line", start: { ...input.start }, end: { ...input.end } };
    case "circle":
      return { kind: "circle", center: { ...input.center }, radius: input.radius };
    case "arc":
      return {
        kind: "arc",
        center: { ...input.center },
        radius: input.radius,
        startAngle: input.start_angle,
        endAngle: input.end_angle,
      };
    case "sketch":
      return { kind: "sketch", plane: input.plane };
    case "solid":
      return { kind: "solid", operation: "extrude", distance: input.distance };
  }
}
