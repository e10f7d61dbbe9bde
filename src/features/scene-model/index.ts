// Scene model feature: property schemas, scene and camera building

export { PROPERTY_SCHEMAS, getShapeSchema, isShapeKind } from './utils/property-schema';
export { buildScene, toMilliseconds } from './utils/scene-builder';
export { CAMERA_PROPERTIES, buildCamera } from './utils/camera';
