// ============================================
// Shape Tests
// Point containment, pairwise overlap and bounds for collider shapes
// ============================================

import { clamp, subVec3, vec3, type Vec3 } from '@stationfall/shared';
import type { ColliderShape } from './Collider';

/**
 * Where a shape sits. Transform satisfies this; so does any bare
 * `{ position }` built for a query.
 */
export interface Placement {
  readonly position: Vec3;
}

export interface Bounds {
  min: Vec3;
  max: Vec3;
}

/**
 * Is `offset` (relative to the capsule centre) inside an upright capsule?
 * Inside the straight section the horizontal distance decides; above or
 * below it, the distance to the nearer cap centre.
 */
function capsuleContainsOffset(offset: Vec3, height: number, radius: number): boolean {
  const halfHeight = height * 0.5;

  if (Math.abs(offset.y) <= halfHeight) {
    return Math.sqrt(offset.x * offset.x + offset.z * offset.z) <= radius;
  }

  const capY = offset.y > 0 ? halfHeight : -halfHeight;
  const dy = offset.y - capY;
  return Math.sqrt(offset.x * offset.x + dy * dy + offset.z * offset.z) <= radius;
}

export function containsPoint(shape: ColliderShape, point: Vec3, placement: Placement): boolean {
  const local = subVec3(point, placement.position);

  switch (shape.kind) {
    case 'box':
      return (
        Math.abs(local.x) <= shape.size.x * 0.5 &&
        Math.abs(local.y) <= shape.size.y * 0.5 &&
        Math.abs(local.z) <= shape.size.z * 0.5
      );
    case 'sphere':
      return Math.sqrt(local.x * local.x + local.y * local.y + local.z * local.z) <= shape.radius;
    case 'capsule':
      return capsuleContainsOffset(local, shape.height, shape.radius);
  }
}

// Closest point on the box to the capsule centre, tested against the capsule.
// Only the centre is clamped, not the whole axis.
function capsuleOverlapsBox(
  capsule: { height: number; radius: number },
  capsulePos: Vec3,
  boxSize: Vec3,
  boxPos: Vec3
): boolean {
  const hx = boxSize.x * 0.5;
  const hy = boxSize.y * 0.5;
  const hz = boxSize.z * 0.5;

  const closest = vec3(
    clamp(capsulePos.x, boxPos.x - hx, boxPos.x + hx),
    clamp(capsulePos.y, boxPos.y - hy, boxPos.y + hy),
    clamp(capsulePos.z, boxPos.z - hz, boxPos.z + hz)
  );

  return capsuleContainsOffset(subVec3(closest, capsulePos), capsule.height, capsule.radius);
}

/**
 * Do two placed shapes overlap?
 *
 * Box/box is an exact AABB test and capsule/box uses the closest-point
 * approximation. Every other pairing only checks whether either centre lies
 * inside the other shape, so it misses overlaps where neither centre is
 * covered.
 */
export function overlapsWith(
  shape: ColliderShape,
  placement: Placement,
  other: ColliderShape,
  otherPlacement: Placement
): boolean {
  const a = placement.position;
  const b = otherPlacement.position;

  if (shape.kind === 'box' && other.kind === 'box') {
    const ha = shape.size;
    const hb = other.size;
    return (
      a.x - ha.x * 0.5 <= b.x + hb.x * 0.5 &&
      a.x + ha.x * 0.5 >= b.x - hb.x * 0.5 &&
      a.y - ha.y * 0.5 <= b.y + hb.y * 0.5 &&
      a.y + ha.y * 0.5 >= b.y - hb.y * 0.5 &&
      a.z - ha.z * 0.5 <= b.z + hb.z * 0.5 &&
      a.z + ha.z * 0.5 >= b.z - hb.z * 0.5
    );
  }

  if (shape.kind === 'capsule' && other.kind === 'box') {
    return capsuleOverlapsBox(shape, a, other.size, b);
  }

  if (shape.kind === 'box' && other.kind === 'capsule') {
    return capsuleOverlapsBox(other, b, shape.size, a);
  }

  return containsPoint(shape, b, placement) || containsPoint(other, a, otherPlacement);
}

function halfExtents(shape: ColliderShape): Vec3 {
  switch (shape.kind) {
    case 'box':
      return vec3(shape.size.x * 0.5, shape.size.y * 0.5, shape.size.z * 0.5);
    case 'sphere':
      return vec3(shape.radius, shape.radius, shape.radius);
    case 'capsule':
      return vec3(shape.radius, shape.height * 0.5 + shape.radius, shape.radius);
  }
}

/**
 * Axis-aligned bounding box of a placed shape.
 */
export function getBounds(shape: ColliderShape, placement: Placement): Bounds {
  const p = placement.position;
  const extent = halfExtents(shape);

  return {
    min: vec3(p.x - extent.x, p.y - extent.y, p.z - extent.z),
    max: vec3(p.x + extent.x, p.y + extent.y, p.z + extent.z),
  };
}
