// ============================================
// Player Components
// ============================================

import { ENGINE_CONFIG } from '@stationfall/shared';
import { ToggleableComponent } from './core';

/**
 * Player - movement tuning and grounded state for a controllable body.
 * Input capture lives outside the engine; callers drive the Transform
 * (see tryMove) and PhysicsSystem handles the vertical axis.
 */
export class Player extends ToggleableComponent {
  isGrounded = true;

  constructor(
    public moveSpeed: number = ENGINE_CONFIG.PLAYER_MOVE_SPEED,
    public turnSpeed: number = ENGINE_CONFIG.PLAYER_TURN_SPEED,
    public jumpForce: number = ENGINE_CONFIG.JUMP_FORCE
  ) {
    super();
  }
}
