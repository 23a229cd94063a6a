export const VERSION = '0.1.0';

// Errors
export { AnnotationIoError } from './errors';
export type { AnnotationIoErrorType } from './errors';

// Geometry
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

// Model
export {
  Annotation,
  Project,
  cloneAnnotations,
  createPoint,
  pointsEqual,
  isFinitePoint,
  isAnnotationKind,
  ANNOTATION_KINDS,
  MIN_COMMITTED_VERTICES,
} from './model';
export type { Point, AnnotationKind, VertexRef } from './model';

// History
export { HistoryManager, DEFAULT_HISTORY_SIZE } from './history';
export type { HistoryManagerOptions, HistoryState } from './history';

// Serialization
export {
  Exporter,
  exporter,
  Importer,
  importer,
  detectFormat,
  tryDetectFormat,
  getExtension,
  unsupportedExtensionError,
  inlineVertexSequences,
  FORMAT_EXTENSIONS,
} from './serialization';
export type {
  ImportResult,
  OperationResult,
  ProjectFormat,
  ProjectRecord,
  AnnotationRecord,
  VertexRecord,
  VertexPair,
} from './serialization';

// IO
export type { DecodedImage, ImageLoader, ProjectStorage } from './io';

// Editor
export { AnnotationEditor, LoadChannel, resolveKeyCommand, DEFAULT_EDITOR_CONFIG, toolToKind } from './editor';
export type {
  AnnotationEditorOptions,
  EditorRenderState,
  EditorTool,
  KeyCommand,
  KeyModifiers,
  LoadChannelOptions,
  LoadOutcome,
  LoadPayload,
  PointerButton,
  PointerDownOptions,
  RenderAnnotation,
  StatusLevel,
  StatusMessage,
} from './editor';
