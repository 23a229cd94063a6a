export type { DecodedImage, ImageLoader, ProjectStorage } from './types';
