import { AnnotationEditor, AnnotationIoError } from '@roimark/core';
import type { AnnotationEditorOptions, DecodedImage, ImageLoader, ProjectStorage } from '@roimark/core';

const images = new Map<string, [number, number]>([['photo.png', [800, 600]]]);

const memoryLoader: ImageLoader = {
  async load(path: string): Promise<DecodedImage> {
    const size = images.get(path);
    if (!size) {
      throw new AnnotationIoError('Image file not found', 'MISSING_MEDIA', path);
    }
    const [width, height] = size;
    return { width, height, pixels: new Uint8Array(width * height * 4) };
  },
};

function memoryStorage(): ProjectStorage {
  const files = new Map<string, string>();
  return {
    async readText(path) {
      const text = files.get(path);
      if (text === undefined) {
        throw new Error(`ENOENT: ${path}`);
      }
      return text;
    },
    async writeText(path, text) {
      files.set(path, text);
    },
    async exists(path) {
      return files.has(path);
    },
  };
}

export function createTestEditor(options: Partial<AnnotationEditorOptions> = {}): AnnotationEditor {
  return new AnnotationEditor({
    imageLoader: memoryLoader,
    storage: memoryStorage(),
    logToConsole: false,
    ...options,
  });
}

/**
 * photo.png를 열고 삼각형 하나를 그린 에디터
 */
export async function createEditorWithTriangle(
  options: Partial<AnnotationEditorOptions> = {}
): Promise<AnnotationEditor> {
  const editor = createTestEditor(options);
  editor.openImage('photo.png');
  await new Promise((resolve) => setTimeout(resolve, 0));
  editor.poll();

  editor.setTool('polygon');
  editor.pointerDown({ x: 0.2, y: 0.2 });
  editor.pointerDown({ x: 0.6, y: 0.2 });
  editor.pointerDown({ x: 0.4, y: 0.6 });
  editor.pointerDown({ x: 0.4, y: 0.6 });
  editor.doubleClick();
  editor.setTool('select');
  editor.selectAnnotation(0);
  return editor;
}
