// Interpolation feature: easing curves and property resolution at a time

export { applyEasing, easeIn, easeInOut, easeOut, isEasingType } from './utils/easing';
export { interpolateValue, resolveTrack } from './utils/interpolation';
export { hasAnimation, resolveObject, resolveSnapshot } from './utils/animated-property-resolver';
