export * from './physics/types';
export * from './physics/errors';
export { wrapAngle, isTerminated } from './physics/angles';
export { createTransform, invertTransform, applyTransform } from './physics/transform';
export { OpticalElement } from './physics/OpticalElement';
export type { Surface } from './physics/OpticalElement';
export { Mirror } from './physics/components/Mirror';
export { SequentialTracer, propagateRays } from './physics/SequentialTracer';
export { ELEMENT_TYPES, DEFAULT_APERTURE, createElement, getTypeName } from './physics/ElementRegistry';
export type { ElementEntry, ElementParams } from './physics/ElementRegistry';
export { toPolylines, randomColor } from './physics/rayPaths';
export type { PolylineOptions, RandomSource, RayPolyline, ViewExtent } from './physics/rayPaths';
export { serializeScene, deserializeScene } from './state/sceneSerializer';
export { createPeriscopeScene } from './presets/periscope';
export { createSingleMirrorScene } from './presets/singleMirror';
