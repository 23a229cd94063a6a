export { SharpImageLoader } from './SharpImageLoader';
export type { SharpImageLoaderOptions } from './SharpImageLoader';
export { FileProjectStorage } from './FileProjectStorage';
export type { FileProjectStorageOptions } from './FileProjectStorage';
