/**
 * Easing functions for animation segments.
 * Each function takes a progress value (0-1) and returns an eased value (0-1).
 * All of them map 0 to 0 and 1 to 1 exactly.
 */

import type { EasingType } from '@/types/timeline';
import { EASING_TYPES } from '@/types/timeline';

/**
 * Linear easing - constant speed
 */
function linear(t: number): number {
  return t;
}

/**
 * Ease in - starts slow, accelerates
 * Uses quadratic function (t^2)
 */
export function easeIn(t: number): number {
  return t * t;
}

/**
 * Ease out - starts fast, decelerates
 * Uses inverse quadratic function
 */
export function easeOut(t: number): number {
  return t * (2 - t);
}

/**
 * Ease in-out - cubic Hermite smoothstep, symmetric around 0.5
 */
export function easeInOut(t: number): number {
  return t * t * (3 - 2 * t);
}

/**
 * Map of easing type to easing function
 */
const easingFunctions: Record<EasingType, (t: number) => number> = {
  linear,
  ease_in: easeIn,
  ease_out: easeOut,
  ease_in_out: easeInOut,
};

export function isEasingType(name: string): name is EasingType {
  return (EASING_TYPES as readonly string[]).includes(name);
}

/**
 * Apply easing to a progress value
 * @param t Progress value, clamped to [0, 1]
 * @returns Eased progress value (0-1)
 */
export function applyEasing(t: number, type: EasingType): number {
  // Clamp input to valid range
  const clampedT = Math.max(0, Math.min(1, t));
  return easingFunctions[type](clampedT);
}
