export { AnnotationEditor } from './AnnotationEditor';
export type { LoadPayload } from './AnnotationEditor';
export { LoadChannel } from './LoadChannel';
export type { LoadOutcome, LoadChannelOptions } from './LoadChannel';
export { resolveKeyCommand } from './keyBindings';
export type { KeyCommand, KeyModifiers } from './keyBindings';
export { DEFAULT_EDITOR_CONFIG, toolToKind } from './types';
export type {
  AnnotationEditorOptions,
  EditorRenderState,
  EditorTool,
  PointerButton,
  PointerDownOptions,
  RenderAnnotation,
  StatusLevel,
  StatusMessage,
} from './types';
