// ============================================
// Core Components
// Shared by multiple entity types
// ============================================

import { vec3, type Toggleable, type Vec2, type Vec3 } from '@stationfall/shared';

/**
 * Base for components that systems can switch off without removing them.
 */
export abstract class ToggleableComponent implements Toggleable {
  enabled = true;

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  withEnabled(enabled: boolean): this {
    this.enabled = enabled;
    return this;
  }
}

/**
 * Transform - position, rotation and scale in 3D space.
 * Used by: Players, Navigators, Walls, anything with a Collider
 *
 * Rotation is Euler angles in radians; rotation.y is yaw, measured from +X
 * toward +Z on the floor plane.
 */
export class Transform extends ToggleableComponent {
  constructor(
    public position: Vec3 = vec3(),
    public rotation: Vec3 = vec3(),
    public scale: Vec3 = vec3(1, 1, 1)
  ) {
    super();
  }

  /**
   * Facing direction on the floor plane
   */
  forward(): Vec3 {
    return vec3(Math.cos(this.rotation.y), 0, Math.sin(this.rotation.y));
  }

  /**
   * Direction 90 degrees clockwise from forward, on the floor plane
   */
  right(): Vec3 {
    const yaw = this.rotation.y + Math.PI / 2;
    return vec3(Math.cos(yaw), 0, Math.sin(yaw));
  }

  translate(delta: Vec3): void {
    this.position.x += delta.x;
    this.position.y += delta.y;
    this.position.z += delta.z;
  }

  /**
   * Position projected onto the floor plane (x, z).
   */
  floorPosition(): Vec2 {
    return { x: this.position.x, y: this.position.z };
  }
}

/**
 * Velocity - linear and angular velocity.
 * Stored separately from Transform for the physics system to integrate.
 * Units: world units (or radians) per second.
 */
export class Velocity extends ToggleableComponent {
  constructor(
    public linear: Vec3 = vec3(),
    public angular: Vec3 = vec3()
  ) {
    super();
  }
}
