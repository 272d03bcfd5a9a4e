// ============================================
// Physics System
// Integrates velocity into transforms and applies gravity to players
// ============================================

import { ENGINE_CONFIG, isComponentEnabled, type World } from '@stationfall/shared';
import type { System } from './types';
import { Player, Transform, Velocity } from '../components';

/**
 * PhysicsSystem - Moves every entity holding Transform + Velocity
 *
 * Handles:
 * - Linear and angular velocity integration
 * - Gravity on airborne players, landing at standing height
 *
 * Entities with a disabled Transform or Velocity are left alone.
 */
export class PhysicsSystem implements System {
  readonly name = 'PhysicsSystem';

  update(world: World, deltaTime: number): void {
    world.queryEach([Transform, Velocity], (entity) => {
      const transform = world.getMut(entity, Transform);
      const velocity = world.getMut(entity, Velocity);
      if (!transform || !velocity) return;
      if (!transform.enabled || !velocity.enabled) return;

      const player = world.getMut(entity, Player);
      const airborne = player !== undefined && isComponentEnabled(player) && !player.isGrounded;

      if (airborne) {
        velocity.linear.y -= ENGINE_CONFIG.GRAVITY * deltaTime;
      }

      transform.position.x += velocity.linear.x * deltaTime;
      transform.position.y += velocity.linear.y * deltaTime;
      transform.position.z += velocity.linear.z * deltaTime;

      transform.rotation.x += velocity.angular.x * deltaTime;
      transform.rotation.y += velocity.angular.y * deltaTime;
      transform.rotation.z += velocity.angular.z * deltaTime;

      // Landing
      if (player && airborne && transform.position.y <= ENGINE_CONFIG.STANDING_HEIGHT && velocity.linear.y <= 0) {
        transform.position.y = ENGINE_CONFIG.STANDING_HEIGHT;
        velocity.linear.y = 0;
        player.isGrounded = true;
      }
    });
  }
}
