export * from './types';
export { detectFormat, tryDetectFormat, getExtension, unsupportedExtensionError } from './format';
export { inlineVertexSequences } from './yamlFlowVertices';
export { Exporter, exporter } from './Exporter';
export { Importer, importer } from './Importer';
export type { ImportResult } from './Importer';
