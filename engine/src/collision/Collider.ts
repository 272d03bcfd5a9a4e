// ============================================
// Collider Component
// Physical or trigger volume attached to an entity
// ============================================

import type { Vec3 } from '@stationfall/shared';
import { ToggleableComponent } from '../ecs/components/core';

/**
 * Collision volume, centred on the owning entity's Transform position.
 * Boxes are axis aligned; capsules stand upright along Y.
 */
export type ColliderShape =
  | { kind: 'box'; size: Vec3 }
  | { kind: 'sphere'; radius: number }
  | { kind: 'capsule'; height: number; radius: number };

export const ColliderShape = {
  box(size: Vec3): ColliderShape {
    return { kind: 'box', size: { x: size.x, y: size.y, z: size.z } };
  },

  sphere(radius: number): ColliderShape {
    return { kind: 'sphere', radius };
  },

  /**
   * `height` is the straight cylinder section, excluding the end caps.
   */
  capsule(height: number, radius: number): ColliderShape {
    return { kind: 'capsule', height, radius };
  },
};

/**
 * Surface response values. Unused by the blocking queries; carried for
 * whatever resolves contacts.
 */
export class ColliderMaterial {
  constructor(
    public readonly friction: number = 0.5,
    public readonly restitution: number = 0,
    public readonly density: number = 1
  ) {}

  static standard(): ColliderMaterial {
    return new ColliderMaterial(0.5, 0, 1);
  }

  static slippery(): ColliderMaterial {
    return new ColliderMaterial(0.1, 0, 1);
  }

  static bouncy(): ColliderMaterial {
    return new ColliderMaterial(0.7, 0.8, 1);
  }
}

/**
 * Collider - shape plus static/trigger flags.
 * Used by: Walls, pillars, players, anything that takes up space
 *
 * Only enabled, non-trigger colliders block movement. Staticness has no
 * effect on blocking.
 */
export class Collider extends ToggleableComponent {
  material: ColliderMaterial = ColliderMaterial.standard();

  constructor(
    public shape: ColliderShape,
    public isStatic: boolean = true,
    public isTrigger: boolean = false
  ) {
    super();
  }

  static staticSolid(shape: ColliderShape): Collider {
    return new Collider(shape, true, false);
  }

  static staticTrigger(shape: ColliderShape): Collider {
    return new Collider(shape, true, true);
  }

  static dynamicSolid(shape: ColliderShape): Collider {
    return new Collider(shape, false, false);
  }

  static dynamicTrigger(shape: ColliderShape): Collider {
    return new Collider(shape, false, true);
  }

  withMaterial(material: ColliderMaterial): this {
    this.material = material;
    return this;
  }

  blocksMovement(): boolean {
    return this.enabled && !this.isTrigger;
  }
}
