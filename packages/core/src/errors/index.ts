export { AnnotationIoError } from './AnnotationIoError';
export type { AnnotationIoErrorType } from './AnnotationIoError';
