import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Annotation } from '../../model/Annotation';
import { Project } from '../../model/Project';
import type { Point } from '../../model/types';
import { Exporter } from '../../serialization/Exporter';
import { AnnotationEditor } from '../AnnotationEditor';
import type { AnnotationEditorOptions } from '../types';
import { DeferredImageLoader, MemoryImageLoader, MemoryStorage, flush, makeImage } from './fakes';

const TRIANGLE: Point[] = [
  { x: 0.2, y: 0.2 },
  { x: 0.6, y: 0.2 },
  { x: 0.4, y: 0.6 },
];

let loader: MemoryImageLoader;
let storage: MemoryStorage;

function createEditor(options: Partial<AnnotationEditorOptions> = {}): AnnotationEditor {
  return new AnnotationEditor({ imageLoader: loader, storage, logToConsole: false, ...options });
}

async function openImage(editor: AnnotationEditor, path = 'photo.png'): Promise<void> {
  editor.openImage(path);
  await flush();
  editor.poll();
}

async function editorWithImage(options: Partial<AnnotationEditorOptions> = {}): Promise<AnnotationEditor> {
  const editor = createEditor(options);
  await openImage(editor);
  return editor;
}

/**
 * 호스트처럼 마지막 점은 더블클릭의 두 누름으로 전달
 */
function drawPolygon(editor: AnnotationEditor, points: Point[]): void {
  editor.setTool('polygon');
  for (const point of points) {
    editor.pointerDown(point);
  }
  editor.pointerDown(points[points.length - 1]);
  editor.doubleClick();
}

function requireProject(editor: AnnotationEditor): Project {
  const project = editor.getProject();
  if (!project) {
    throw new Error('editor has no project');
  }
  return project;
}

function vertexAt(editor: AnnotationEditor, annotationIndex: number, vertexIndex: number): Point | undefined {
  return requireProject(editor).getAnnotation(annotationIndex)?.getVertex(vertexIndex);
}

beforeEach(() => {
  loader = new MemoryImageLoader();
  loader.images.set('photo.png', makeImage(1000, 500));
  storage = new MemoryStorage();
});

describe('AnnotationEditor - loading images', () => {
  it('installs a fresh project once the load is polled', async () => {
    const editor = createEditor();

    editor.openImage('photo.png');
    expect(editor.isLoading()).toBe(true);
    expect(editor.needsContinuousPolling()).toBe(true);
    expect(editor.poll()).toBe(false);

    await flush();
    expect(editor.poll()).toBe(true);

    const state = editor.getRenderState();
    expect(state.isLoading).toBe(false);
    expect(state.mediaFile).toBe('photo.png');
    expect(state.frameSize).toEqual({ width: 1000, height: 500 });
    expect(state.hasImage).toBe(true);
    expect(state.annotations).toEqual([]);
    expect(editor.getImage()?.pixels.length).toBe(1000 * 500 * 4);
    expect(editor.getAnnotationCounter()).toBe(0);
  });

  it('reports a failed load and keeps the current project', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);

    await openImage(editor, 'missing.png');

    expect(editor.getRenderState().mediaFile).toBe('photo.png');
    expect(editor.getRenderState().annotations).toHaveLength(1);
    expect(editor.getStatusMessages().at(-1)).toMatchObject({
      level: 'error',
      text: 'Failed to load image: Image file not found (missing.png)',
    });
  });

  it('replaces the project and history when a new image is opened', async () => {
    loader.images.set('second.png', makeImage(200, 200));
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);

    await openImage(editor, 'second.png');

    expect(editor.getRenderState().annotations).toEqual([]);
    expect(editor.canUndo()).toBe(false);
    expect(editor.getAnnotationCounter()).toBe(0);
  });

  it('ignores pointer input while loading', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');

    editor.openImage('photo.png');
    editor.pointerDown({ x: 0.5, y: 0.5 });

    expect(editor.getRenderState().inProgress).toBeNull();
  });

  it('installs only the latest of overlapping loads', async () => {
    const deferredLoader = new DeferredImageLoader();
    const editor = createEditor({ imageLoader: deferredLoader });

    editor.openImage('a.png');
    editor.openImage('b.png');
    await flush();
    expect(deferredLoader.requests.map((r) => r.path)).toEqual(['a.png', 'b.png']);

    deferredLoader.requests[0].resolve(makeImage(10, 10));
    await flush();
    expect(editor.poll()).toBe(false);
    expect(editor.isLoading()).toBe(true);

    deferredLoader.requests[1].resolve(makeImage(20, 20));
    await flush();
    expect(editor.poll()).toBe(true);
    expect(editor.getRenderState().mediaFile).toBe('b.png');
    expect(editor.getRenderState().frameSize).toEqual({ width: 20, height: 20 });
  });
});

describe('AnnotationEditor - drawing', () => {
  it('does not start an annotation until the first press', async () => {
    const editor = await editorWithImage();

    editor.setTool('polygon');
    expect(editor.getRenderState().inProgress).toBeNull();

    editor.pointerDown({ x: 0.1, y: 0.1 });
    expect(editor.getRenderState().inProgress).toEqual({
      name: 'region 1',
      kind: 'polygon',
      vertices: [{ x: 0.1, y: 0.1 }],
      closed: true,
    });
  });

  it('discards a single-vertex annotation on finish', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');
    editor.pointerDown({ x: 0.1, y: 0.1 });

    expect(editor.finishAnnotation()).toBe(false);

    expect(requireProject(editor).annotationCount()).toBe(0);
    expect(editor.getAnnotationCounter()).toBe(0);
    expect(editor.canUndo()).toBe(false);
    expect(editor.getRenderState().inProgress).toBeNull();
  });

  it('commits a two-vertex annotation with an undoable snapshot', async () => {
    const editor = await editorWithImage();
    editor.setTool('line');
    editor.pointerDown({ x: 0.1, y: 0.1 });
    editor.pointerDown({ x: 0.3, y: 0.1 });

    expect(editor.finishAnnotation()).toBe(true);

    expect(requireProject(editor).annotationCount()).toBe(1);
    expect(editor.getAnnotationCounter()).toBe(1);
    expect(editor.canUndo()).toBe(true);

    expect(editor.undo()).toBe(true);
    expect(requireProject(editor).annotationCount()).toBe(0);
  });

  it('names annotations from the running counter', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);

    editor.setTool('line');
    editor.pointerDown({ x: 0.7, y: 0.7 });
    editor.pointerDown({ x: 0.9, y: 0.9 });
    editor.escape();

    expect(editor.getRenderState().annotations.map((a) => [a.name, a.kind, a.closed])).toEqual([
      ['region 1', 'polygon', true],
      ['line 2', 'line', false],
    ]);
  });

  it('drops the vertex left by the second press of a double-click', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');
    editor.pointerDown({ x: 0.2, y: 0.2 });
    editor.pointerDown({ x: 0.6, y: 0.2 });
    editor.pointerDown({ x: 0.4, y: 0.6 });
    editor.pointerDown({ x: 0.4, y: 0.6 });

    editor.doubleClick();

    expect(requireProject(editor).getAnnotation(0)?.vertices).toEqual(TRIANGLE);
  });

  it('does not commit a polygon from a lone double-click', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');
    editor.pointerDown({ x: 0.5, y: 0.5 });
    editor.pointerDown({ x: 0.5, y: 0.5 });

    editor.doubleClick();

    expect(requireProject(editor).annotationCount()).toBe(0);
    expect(editor.getAnnotationCounter()).toBe(0);
    expect(editor.canUndo()).toBe(false);
    expect(editor.getRenderState().inProgress).toBeNull();
  });

  it('keeps distinct closing vertices on double-click', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');
    editor.pointerDown({ x: 0.2, y: 0.2 });
    editor.pointerDown({ x: 0.6, y: 0.2 });

    editor.doubleClick();

    expect(requireProject(editor).getAnnotation(0)?.vertexCount()).toBe(2);
  });

  it('ignores presses with non-finite coordinates', async () => {
    const editor = await editorWithImage();
    editor.setTool('line');
    editor.pointerDown({ x: 0.1, y: 0.1 });

    editor.pointerDown({ x: Number.NaN, y: 0.3 });
    editor.pointerDown({ x: 0.3, y: Infinity });

    expect(editor.getRenderState().inProgress?.vertices).toEqual([{ x: 0.1, y: 0.1 }]);
    expect(editor.getStatusMessages().at(-1)).toMatchObject({
      level: 'warning',
      text: 'Ignored pointer event with non-finite coordinates (0.3, Infinity)',
    });
    expect(editor.finishAnnotation()).toBe(false);
    expect(requireProject(editor).annotationCount()).toBe(0);
  });

  it('finishes polygons only on double-click', async () => {
    const editor = await editorWithImage();
    editor.setTool('line');
    editor.pointerDown({ x: 0.1, y: 0.1 });
    editor.pointerDown({ x: 0.2, y: 0.2 });
    editor.doubleClick();

    expect(requireProject(editor).annotationCount()).toBe(0);
    expect(editor.getRenderState().inProgress?.vertices).toHaveLength(2);
  });

  it('cancels an in-progress polygon on escape', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');
    editor.pointerDown({ x: 0.1, y: 0.1 });
    editor.pointerDown({ x: 0.2, y: 0.2 });

    editor.escape();

    expect(editor.getRenderState().inProgress).toBeNull();
    expect(requireProject(editor).annotationCount()).toBe(0);
    expect(editor.canUndo()).toBe(false);
  });

  it('discards the in-progress annotation when the tool changes', async () => {
    const editor = await editorWithImage();
    editor.setTool('polygon');
    editor.pointerDown({ x: 0.1, y: 0.1 });
    editor.pointerDown({ x: 0.2, y: 0.2 });

    editor.setTool('line');

    expect(editor.getRenderState().inProgress).toBeNull();
    expect(requireProject(editor).annotationCount()).toBe(0);
  });

  it('ignores presses without a project', () => {
    const editor = createEditor();
    editor.setTool('polygon');

    editor.pointerDown({ x: 0.1, y: 0.1 });

    expect(editor.getRenderState().inProgress).toBeNull();
  });
});

describe('AnnotationEditor - selection and editing', () => {
  it('selects the annotation under the pointer and clears on a miss', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');

    editor.pointerDown({ x: 0.4, y: 0.3 });
    expect(editor.getSelectedIndex()).toBe(0);

    editor.pointerDown({ x: 0.9, y: 0.9 });
    expect(editor.getSelectedIndex()).toBeNull();
  });

  it('prefers the topmost annotation', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    drawPolygon(editor, [
      { x: 0.3, y: 0.25 },
      { x: 0.5, y: 0.25 },
      { x: 0.4, y: 0.4 },
    ]);
    editor.setTool('select');

    editor.pointerDown({ x: 0.4, y: 0.3 });

    expect(editor.getSelectedIndex()).toBe(1);
  });

  it('selects lines by proximity to their segments', async () => {
    const editor = await editorWithImage();
    editor.setTool('line');
    editor.pointerDown({ x: 0.1, y: 0.5 });
    editor.pointerDown({ x: 0.9, y: 0.5 });
    editor.finishAnnotation();
    editor.setTool('select');

    editor.pointerDown({ x: 0.5, y: 0.505 });
    expect(editor.getSelectedIndex()).toBe(0);

    editor.pointerDown({ x: 0.5, y: 0.52 });
    expect(editor.getSelectedIndex()).toBeNull();
  });

  it('clears the selection when switching to a draw tool', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });

    editor.setTool('line');

    expect(editor.getSelectedIndex()).toBeNull();
  });

  it('drags a vertex of the selected annotation with one snapshot', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });
    editor.pointerUp();

    editor.pointerDown({ x: 0.6, y: 0.2 });
    expect(editor.getRenderState().dragTarget).toEqual({ annotationIndex: 0, vertexIndex: 1 });

    editor.pointerMove({ x: 0.65, y: 0.22 });
    editor.pointerMove({ x: 0.7, y: 0.25 });
    editor.pointerUp();

    expect(editor.getRenderState().dragTarget).toBeNull();
    expect(vertexAt(editor, 0, 1)).toEqual({ x: 0.7, y: 0.25 });

    expect(editor.undo()).toBe(true);
    expect(vertexAt(editor, 0, 1)).toEqual({ x: 0.6, y: 0.2 });
    expect(editor.getSelectedIndex()).toBeNull();
  });

  it('keeps the dragged vertex in place on a non-finite move', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });
    editor.pointerDown({ x: 0.6, y: 0.2 });

    editor.pointerMove({ x: Number.NaN, y: 0.25 });

    expect(vertexAt(editor, 0, 1)).toEqual({ x: 0.6, y: 0.2 });
    expect(editor.getRenderState().dragTarget).toEqual({ annotationIndex: 0, vertexIndex: 1 });
    expect(editor.getStatusMessages().at(-1)?.text).toBe(
      'Ignored pointer event with non-finite coordinates (NaN, 0.25)'
    );

    editor.pointerMove({ x: 0.65, y: 0.25 });
    expect(vertexAt(editor, 0, 1)).toEqual({ x: 0.65, y: 0.25 });
  });

  it('removes a vertex on a secondary press but keeps at least two', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });

    editor.pointerDown({ x: 0.4, y: 0.6 }, { button: 'secondary' });
    expect(requireProject(editor).getAnnotation(0)?.vertexCount()).toBe(2);

    editor.pointerDown({ x: 0.6, y: 0.2 }, { button: 'secondary' });
    expect(requireProject(editor).getAnnotation(0)?.vertexCount()).toBe(2);
    expect(editor.getStatusMessages().at(-1)).toMatchObject({
      level: 'warning',
      text: '"region 1" needs at least 2 vertices',
    });

    editor.undo();
    expect(requireProject(editor).getAnnotation(0)?.vertexCount()).toBe(3);
  });

  it('uses the reported display size for pick tolerance', async () => {
    const editor = await editorWithImage();

    expect(editor.getPickTolerance()).toBe(0.008);

    editor.setDisplaySize(400, 200);
    expect(editor.getPickTolerance()).toBe(0.02);
  });
});

describe('AnnotationEditor - commands', () => {
  it('restores dragged geometry first, then the pre-drag geometry, after a delete', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    expect(requireProject(editor).annotationCount()).toBe(1);

    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });
    editor.pointerUp();
    editor.pointerDown({ x: 0.6, y: 0.2 });
    editor.pointerMove({ x: 0.7, y: 0.25 });
    editor.pointerUp();

    expect(editor.deleteSelected()).toBe(true);
    expect(requireProject(editor).annotationCount()).toBe(0);

    editor.undo();
    expect(requireProject(editor).annotationCount()).toBe(1);
    expect(vertexAt(editor, 0, 1)).toEqual({ x: 0.7, y: 0.25 });

    editor.undo();
    expect(vertexAt(editor, 0, 1)).toEqual({ x: 0.6, y: 0.2 });

    editor.redo();
    editor.redo();
    expect(requireProject(editor).annotationCount()).toBe(0);
  });

  it('ignores the delete key while text input is active', async () => {
    let typing = true;
    const editor = await editorWithImage({ isTextInputActive: () => typing });
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });

    expect(editor.isKeyboardSuppressed()).toBe(true);
    expect(editor.deleteKey()).toBe(false);
    expect(requireProject(editor).annotationCount()).toBe(1);

    typing = false;
    expect(editor.deleteKey()).toBe(true);
    expect(requireProject(editor).annotationCount()).toBe(0);
  });

  it('clears the selection on escape when nothing is being drawn', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('select');
    editor.pointerDown({ x: 0.4, y: 0.3 });

    editor.escape();

    expect(editor.getSelectedIndex()).toBeNull();
    expect(requireProject(editor).annotationCount()).toBe(1);
  });

  it('renames with an undoable snapshot and refuses blank names', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);

    expect(editor.renameAnnotation(0, '   ')).toBe(false);
    expect(editor.renameAnnotation(0, '  roof  ')).toBe(true);
    expect(editor.getRenderState().annotations[0].name).toBe('roof');

    editor.undo();
    expect(editor.getRenderState().annotations[0].name).toBe('region 1');
  });

  it('treats stale indices as no-ops', async () => {
    const editor = await editorWithImage();

    expect(editor.selectAnnotation(3)).toBe(false);
    expect(editor.renameAnnotation(3, 'x')).toBe(false);
    expect(editor.deleteSelected()).toBe(false);
    expect(editor.undo()).toBe(false);
    expect(editor.redo()).toBe(false);
  });
});

describe('AnnotationEditor - annotation files', () => {
  const exporter = new Exporter();

  function savedProject(): Project {
    return new Project('photo.png', 1000, 500, [
      new Annotation('region 1', 'polygon', TRIANGLE),
      new Annotation('line 2', 'line', [
        { x: 0.1, y: 0.9 },
        { x: 0.9, y: 0.9 },
      ]),
    ]);
  }

  it('rejects unsupported extensions without reading', () => {
    const editor = createEditor();

    expect(editor.loadAnnotations('labels.txt')).toBe(false);

    expect(storage.reads).toEqual([]);
    expect(editor.isLoading()).toBe(false);
    expect(editor.getStatusMessages().at(-1)).toMatchObject({
      level: 'error',
      text: 'Unsupported annotation file extension: .txt (expected .json, .yaml or .yml) (labels.txt)',
    });
  });

  it('installs an imported project with its image', async () => {
    storage.files.set('labels.json', exporter.toJSON(savedProject()));
    const editor = createEditor();

    expect(editor.loadAnnotations('labels.json')).toBe(true);
    await flush();
    expect(editor.poll()).toBe(true);

    const state = editor.getRenderState();
    expect(state.annotations.map((a) => a.name)).toEqual(['region 1', 'line 2']);
    expect(state.hasImage).toBe(true);
    expect(state.canUndo).toBe(false);
    expect(editor.getAnnotationCounter()).toBe(2);
    expect(loader.calls).toEqual(['photo.png']);

    editor.setTool('polygon');
    editor.pointerDown({ x: 0.5, y: 0.5 });
    expect(editor.getRenderState().inProgress?.name).toBe('region 3');
  });

  it('installs annotations without an image when the image is missing', async () => {
    loader.images.clear();
    storage.files.set('labels.yaml', exporter.toYAML(savedProject()));
    const editor = createEditor();

    editor.loadAnnotations('labels.yaml');
    await flush();
    editor.poll();

    expect(editor.getRenderState().annotations).toHaveLength(2);
    expect(editor.getRenderState().hasImage).toBe(false);
    expect(editor.getStatusMessages()).toContainEqual(
      expect.objectContaining({
        level: 'warning',
        text: 'Annotations loaded without image: Image file not found (photo.png)',
      })
    );
  });

  it('warns when the image size differs from the recorded frame size', async () => {
    loader.images.set('photo.png', makeImage(800, 600));
    storage.files.set('labels.json', exporter.toJSON(savedProject()));
    const editor = createEditor();

    editor.loadAnnotations('labels.json');
    await flush();
    editor.poll();

    expect(editor.getStatusMessages()).toContainEqual(
      expect.objectContaining({
        level: 'warning',
        text: 'Image size 800x600 differs from recorded frame size 1000x500',
      })
    );
  });

  it('installs nothing when the file cannot be parsed', async () => {
    storage.files.set('broken.json', '{ "media_file": ');
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);

    editor.loadAnnotations('broken.json');
    await flush();
    editor.poll();

    expect(editor.getRenderState().annotations).toHaveLength(1);
    expect(editor.canUndo()).toBe(true);
    const last = editor.getStatusMessages().at(-1);
    expect(last?.level).toBe('error');
    expect(last?.text).toMatch(/^Failed to load annotations: JSON parse error: /);
  });

  it('reports a missing annotation file', async () => {
    const editor = createEditor();

    editor.loadAnnotations('nowhere.json');
    await flush();
    editor.poll();

    expect(editor.getProject()).toBeNull();
    expect(editor.getStatusMessages().at(-1)?.text).toBe(
      'Failed to load annotations: Annotation file not found (nowhere.json)'
    );
  });

  it('exports committed annotations in the format of the extension', async () => {
    const editor = await editorWithImage();
    drawPolygon(editor, TRIANGLE);
    editor.setTool('line');
    editor.pointerDown({ x: 0.1, y: 0.1 });

    const json = await editor.exportAnnotations('out/labels.json');
    const yaml = await editor.exportAnnotations('out/labels.yml');

    expect(json).toEqual({ success: true, errors: [], warnings: [] });
    expect(yaml.success).toBe(true);

    const project = requireProject(editor);
    expect(project.annotationCount()).toBe(1);
    expect(storage.files.get('out/labels.json')).toBe(exporter.toJSON(project));
    expect(storage.files.get('out/labels.yml')).toBe(exporter.toYAML(project));
  });

  it('refuses to export without a project or with an unknown extension', async () => {
    const editor = createEditor();

    expect(await editor.exportAnnotations('labels.json')).toEqual({
      success: false,
      errors: ['Failed to save annotations: No project to save (labels.json)'],
      warnings: [],
    });

    await openImage(editor);
    const result = await editor.exportAnnotations('labels.csv');
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      'Failed to save annotations: Unsupported annotation file extension: .csv (expected .json, .yaml or .yml) (labels.csv)',
    ]);
    expect(storage.files.size).toBe(0);
  });

  it('reports write failures as a result', async () => {
    const editor = await editorWithImage();
    storage.failWrites = true;

    const result = await editor.exportAnnotations('labels.json');

    expect(result).toEqual({
      success: false,
      errors: ['Failed to save annotations: disk full (labels.json)'],
      warnings: [],
    });
  });
});

describe('AnnotationEditor - observation', () => {
  it('caches the render state until something changes', async () => {
    const editor = await editorWithImage();

    const first = editor.getRenderState();
    expect(editor.getRenderState()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);

    editor.setTool('polygon');
    const second = editor.getRenderState();
    expect(second).not.toBe(first);
    expect(second.tool).toBe('polygon');
  });

  it('notifies subscribers until they unsubscribe', async () => {
    const editor = await editorWithImage();
    const listener = vi.fn();

    const unsubscribe = editor.subscribe(listener);
    editor.setTool('line');
    expect(listener).toHaveBeenCalledTimes(1);

    unsubscribe();
    editor.setTool('select');
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('keeps a bounded status log and forwards messages', async () => {
    const onStatus = vi.fn();
    const editor = await editorWithImage({ maxStatusMessages: 3, onStatus });

    editor.renameAnnotation(0, '');
    editor.renameAnnotation(0, '');
    editor.renameAnnotation(0, '');

    expect(editor.getStatusMessages().map((m) => m.text)).toEqual([
      'Annotation name cannot be empty',
      'Annotation name cannot be empty',
      'Annotation name cannot be empty',
    ]);
    expect(onStatus).toHaveBeenCalledTimes(5);
  });

  it('logs status messages to the console when enabled', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    try {
      await editorWithImage({ logToConsole: true });
      expect(info).toHaveBeenCalledWith('[AnnotationEditor] Opened photo.png (1000x500)');
    } finally {
      info.mockRestore();
    }
  });
});
