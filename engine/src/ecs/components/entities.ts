// ============================================
// Entity Type Components
// Marker + data components for non-player entities
// ============================================

import { WallType } from '@stationfall/shared';
import { ToggleableComponent } from './core';

/**
 * Wall - marks a collider generated from a map wall cell.
 * `toggleable` walls (pillars) can have their collider switched off at run
 * time to open or close routes.
 */
export class Wall extends ToggleableComponent {
  constructor(
    public readonly cell: readonly [number, number],
    public readonly wallType: WallType = WallType.TechPanel,
    public readonly toggleable: boolean = false
  ) {
    super();
  }
}
