// ============================================
// Shared Types & Constants
// Used by the engine and by any renderer
// ============================================

// ECS Module - entity/component storage and the World facade
export * from './ecs';

// Math utilities - vectors and angles
export * from './math';

// Grid map - static layout and coordinate transforms
export * from './map';

// Engine constants (ENGINE_CONFIG)
export * from './constants';
