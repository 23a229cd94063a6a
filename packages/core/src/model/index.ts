export * from './types';
export { Annotation } from './Annotation';
export { Project, cloneAnnotations } from './Project';
