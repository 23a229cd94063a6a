export {
  distanceSquared,
  distance,
  distanceToSegmentSquared,
  distanceToPathSquared,
  nearestVertex,
  vertexWithinThreshold,
  pointInPolygon,
  normalizePoint,
  denormalizePoint,
  pixelToleranceToNormalized,
} from './geometry';
