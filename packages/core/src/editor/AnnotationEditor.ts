/**
 * Annotation Editor
 *
 * 포인터/키보드 입력을 어노테이션 편집으로 변환하는 컨트롤러
 *
 * 책임:
 * - 도구 상태 머신 (select / polygon / line)
 * - 그리기, 선택, 꼭짓점 드래그/삭제
 * - 변경 직전 스냅샷 기록 (HistoryManager)
 * - 이미지/어노테이션 파일 로드 (LoadChannel, 호스트가 poll)
 * - 렌더링용 읽기 전용 상태 제공
 *
 * 모든 변경은 동기적이며 한 입력이 끝난 뒤 다음 입력을 처리함
 * 인덱스 기반 작업은 사용 직전에 인덱스를 다시 검증 (오래된 인덱스는 무시)
 */

import { AnnotationIoError } from '../errors';
import { Annotation } from '../model/Annotation';
import { Project, cloneAnnotations } from '../model/Project';
import type { Point, VertexRef } from '../model/types';
import { MIN_COMMITTED_VERTICES, isFinitePoint } from '../model/types';
import {
  distanceSquared,
  distanceToPathSquared,
  pixelToleranceToNormalized,
  pointInPolygon,
  vertexWithinThreshold,
} from '../geometry';
import { HistoryManager } from '../history';
import type { DecodedImage, ImageLoader, ProjectStorage } from '../io/types';
import { exporter } from '../serialization/Exporter';
import { importer } from '../serialization/Importer';
import { tryDetectFormat, unsupportedExtensionError } from '../serialization/format';
import type { OperationResult } from '../serialization/types';
import { LoadChannel } from './LoadChannel';
import type {
  AnnotationEditorOptions,
  EditorRenderState,
  EditorTool,
  PointerDownOptions,
  RenderAnnotation,
  StatusLevel,
  StatusMessage,
} from './types';
import { DEFAULT_EDITOR_CONFIG, toolToKind } from './types';

// =============================================================================
// Load Payloads
// =============================================================================

/**
 * 백그라운드 로드 결과
 *
 * - image: 새 이미지 열기 → 빈 프로젝트 생성
 * - project: 어노테이션 파일 가져오기 → 프로젝트 + 참조 이미지 (실패 시 null)
 */
export type LoadPayload =
  | { kind: 'image'; imagePath: string; image: DecodedImage }
  | {
      kind: 'project';
      annotationPath: string;
      project: Project;
      image: DecodedImage | null;
      warnings: string[];
    };

type LoadKind = LoadPayload['kind'];

const NAME_PREFIX = {
  polygon: 'region',
  line: 'line',
} as const;

// =============================================================================
// Annotation Editor
// =============================================================================

export class AnnotationEditor {
  // 협력 객체
  private readonly imageLoader: ImageLoader;
  private readonly storage: ProjectStorage;
  private readonly history: HistoryManager<Annotation[]>;
  private readonly channel: LoadChannel<LoadPayload>;

  // 설정
  private readonly pickRadiusPx: number;
  private readonly maxStatusMessages: number;
  private readonly logToConsole: boolean;
  private readonly isTextInputActive?: () => boolean;
  private readonly onStatus?: (message: StatusMessage) => void;

  // 편집 상태
  private tool: EditorTool = 'select';
  private project: Project | null = null;
  private image: DecodedImage | null = null;
  private selectedIndex: number | null = null;
  private inProgress: Annotation | null = null;
  private dragTarget: VertexRef | null = null;
  private annotationCounter = 0;

  /** 대기 중인 로드 종류 (에러 메시지용) */
  private pendingLoad: LoadKind | null = null;

  /** 호스트가 보고한 표시 크기 (없으면 프레임 크기 사용) */
  private displaySize: { width: number; height: number } | null = null;

  private statusMessages: StatusMessage[] = [];
  private listeners = new Set<() => void>();

  /** 렌더 상태 캐시 (변경 시 폐기) */
  private renderState: EditorRenderState | null = null;

  constructor(options: AnnotationEditorOptions) {
    this.imageLoader = options.imageLoader;
    this.storage = options.storage;
    this.pickRadiusPx = options.pickRadiusPx ?? DEFAULT_EDITOR_CONFIG.pickRadiusPx;
    this.maxStatusMessages = Math.max(1, options.maxStatusMessages ?? DEFAULT_EDITOR_CONFIG.maxStatusMessages);
    this.logToConsole = options.logToConsole ?? DEFAULT_EDITOR_CONFIG.logToConsole;
    this.isTextInputActive = options.isTextInputActive;
    this.onStatus = options.onStatus;

    this.history = new HistoryManager<Annotation[]>({
      maxSize: options.maxHistorySize ?? DEFAULT_EDITOR_CONFIG.maxHistorySize,
      clone: cloneAnnotations,
    });

    this.channel = new LoadChannel<LoadPayload>({
      onStale: (generation) => {
        if (this.logToConsole) {
          console.info(`[AnnotationEditor] Discarded result of superseded load #${generation}`);
        }
      },
    });
  }

  // ---------------------------------------------------------------------------
  // Tools
  // ---------------------------------------------------------------------------

  getTool(): EditorTool {
    return this.tool;
  }

  /**
   * 도구 변경
   *
   * 그리던 어노테이션은 버리고 드래그는 종료
   * 그리기 도구로 바꾸면 선택 해제
   */
  setTool(tool: EditorTool): void {
    if (tool === this.tool) {
      return;
    }

    this.tool = tool;
    this.inProgress = null;
    this.dragTarget = null;
    if (toolToKind(tool)) {
      this.selectedIndex = null;
    }
    this.notify();
  }

  // ---------------------------------------------------------------------------
  // Pointer Input
  // ---------------------------------------------------------------------------

  /**
   * 포인터 누름 (정규화 좌표)
   */
  pointerDown(point: Point, options: PointerDownOptions = {}): void {
    const project = this.project;
    if (!project || this.isLoading()) {
      return;
    }
    if (!isFinitePoint(point)) {
      this.reportNonFinitePoint(point);
      return;
    }

    const button = options.button ?? 'primary';
    const kind = toolToKind(this.tool);

    if (kind) {
      if (button !== 'primary') {
        return;
      }
      if (!this.inProgress) {
        this.inProgress = new Annotation(`${NAME_PREFIX[kind]} ${this.annotationCounter + 1}`, kind);
      }
      this.inProgress.addVertex(point);
      this.notify();
      return;
    }

    this.handleSelectPress(project, point, button === 'secondary');
  }

  /**
   * 포인터 이동 - 드래그 중일 때만 꼭짓점 이동 (스냅샷 없음)
   */
  pointerMove(point: Point): void {
    const target = this.dragTarget;
    if (!target || !this.project) {
      return;
    }
    if (!isFinitePoint(point)) {
      this.reportNonFinitePoint(point);
      return;
    }

    const annotation = this.project.getAnnotation(target.annotationIndex);
    if (!annotation || !annotation.updateVertex(target.vertexIndex, point)) {
      this.dragTarget = null;
    }
    this.notify();
  }

  pointerUp(): void {
    if (!this.dragTarget) {
      return;
    }
    this.dragTarget = null;
    this.notify();
  }

  /**
   * 더블클릭 - 다각형 완료
   *
   * 더블클릭을 구성하는 누름은 호스트가 먼저 일반 누름으로 전달함
   * 두 번째 누름이 남긴 중복 꼭짓점(선택 반경 안)은 커밋 게이트 전에 제거
   */
  doubleClick(): void {
    const annotation = this.inProgress;
    if (this.isLoading() || this.tool !== 'polygon' || !annotation) {
      return;
    }

    const count = annotation.vertexCount();
    const last = annotation.getVertex(count - 1);
    const previous = annotation.getVertex(count - 2);
    const tolerance = this.getPickTolerance();
    if (last && previous && distanceSquared(last, previous) <= tolerance * tolerance) {
      annotation.removeVertex(count - 1);
    }

    this.finishAnnotation();
  }

  // ---------------------------------------------------------------------------
  // Drawing
  // ---------------------------------------------------------------------------

  /**
   * 그리던 어노테이션 완료
   *
   * 꼭짓점 2개 미만이면 조용히 버림
   *
   * @returns 커밋 여부
   */
  finishAnnotation(): boolean {
    const annotation = this.inProgress;
    const project = this.project;
    if (!annotation || !project) {
      return false;
    }

    this.inProgress = null;

    if (annotation.vertexCount() < MIN_COMMITTED_VERTICES) {
      this.notify();
      return false;
    }

    this.history.push(project.annotations);
    project.commitAnnotation(annotation);
    this.annotationCounter++;
    this.notify();
    return true;
  }

  /**
   * 그리던 어노테이션 취소 (히스토리/카운터 변화 없음)
   */
  cancelAnnotation(): boolean {
    if (!this.inProgress) {
      return false;
    }
    this.inProgress = null;
    this.notify();
    return true;
  }

  /**
   * Escape
   *
   * 1. line 도구로 그리는 중이면 완료
   * 2. 그리는 중이면 취소
   * 3. 그 외에는 선택 해제
   */
  escape(): void {
    if (this.inProgress) {
      if (this.tool === 'line') {
        this.finishAnnotation();
      } else {
        this.cancelAnnotation();
      }
      return;
    }

    if (this.selectedIndex !== null) {
      this.selectedIndex = null;
      this.notify();
    }
  }

  // ---------------------------------------------------------------------------
  // Selection & Commands
  // ---------------------------------------------------------------------------

  getSelectedIndex(): number | null {
    return this.selectedIndex;
  }

  /**
   * 목록 등 캔버스 밖에서의 선택
   *
   * @returns 범위 밖 인덱스면 false (선택 유지)
   */
  selectAnnotation(index: number | null): boolean {
    if (index !== null && !this.project?.getAnnotation(index)) {
      return false;
    }
    if (index === this.selectedIndex) {
      return true;
    }
    this.selectedIndex = index;
    this.dragTarget = null;
    this.notify();
    return true;
  }

  /**
   * 선택된 어노테이션 삭제 (명시적 동작)
   */
  deleteSelected(): boolean {
    const project = this.project;
    const index = this.selectedIndex;
    if (!project || index === null) {
      return false;
    }

    const annotation = project.getAnnotation(index);
    if (!annotation) {
      this.selectedIndex = null;
      this.notify();
      return false;
    }

    this.history.push(project.annotations);
    project.removeAnnotation(index);
    this.selectedIndex = null;
    this.dragTarget = null;
    this.notify();
    this.report('info', `Deleted "${annotation.name}"`);
    return true;
  }

  /**
   * Delete/Backspace 키 - 텍스트 편집 중이면 무시
   */
  deleteKey(): boolean {
    if (this.isKeyboardSuppressed()) {
      return false;
    }
    return this.deleteSelected();
  }

  /**
   * 다른 UI가 텍스트 입력을 받는 중인지
   */
  isKeyboardSuppressed(): boolean {
    return this.isTextInputActive?.() ?? false;
  }

  /**
   * 어노테이션 이름 변경 (빈 이름 거부)
   */
  renameAnnotation(index: number, name: string): boolean {
    const trimmed = name.trim();
    if (trimmed === '') {
      this.report('warning', 'Annotation name cannot be empty');
      return false;
    }

    const project = this.project;
    const annotation = project?.getAnnotation(index);
    if (!project || !annotation || annotation.name === trimmed) {
      return false;
    }

    this.history.push(project.annotations);
    annotation.rename(trimmed);
    this.notify();
    return true;
  }

  // ---------------------------------------------------------------------------
  // History
  // ---------------------------------------------------------------------------

  undo(): boolean {
    const project = this.project;
    if (!project) {
      return false;
    }

    const previous = this.history.undo(project.annotations);
    if (!previous) {
      return false;
    }

    this.installAnnotations(project, previous);
    return true;
  }

  redo(): boolean {
    const project = this.project;
    if (!project) {
      return false;
    }

    const next = this.history.redo(project.annotations);
    if (!next) {
      return false;
    }

    this.installAnnotations(project, next);
    return true;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /**
   * 이미지 열기 (비동기 - 결과는 poll()에서 설치)
   */
  openImage(path: string): void {
    this.dispatch('image', async (): Promise<LoadPayload> => {
      const image = await this.imageLoader.load(path);
      return { kind: 'image', imagePath: path, image };
    });
    this.report('info', `Opening image ${path}`);
  }

  /**
   * 어노테이션 파일 가져오기 (비동기 - 결과는 poll()에서 설치)
   *
   * 지원하지 않는 확장자는 즉시 보고하고 아무것도 읽지 않음
   *
   * @returns 로드 시작 여부
   */
  loadAnnotations(path: string): boolean {
    const format = tryDetectFormat(path);
    if (!format) {
      this.report('error', unsupportedExtensionError(path).describe());
      return false;
    }

    this.dispatch('project', async (): Promise<LoadPayload> => {
      const text = await this.readAnnotationFile(path);

      const result = importer.decode(text, format);
      if (!result.success || !result.project) {
        const type = result.errors.some(isParseError) ? 'PARSE' : 'SCHEMA';
        throw new AnnotationIoError(result.errors.join('; '), type, path);
      }

      const project = result.project;
      const warnings = [...result.warnings];
      const mediaPath = this.storage.resolveMediaPath?.(path, project.mediaFile) ?? project.mediaFile;

      let image: DecodedImage | null = null;
      try {
        image = await this.imageLoader.load(mediaPath);
      } catch (e) {
        const error = AnnotationIoError.from(e, 'DECODE', mediaPath);
        warnings.push(`Annotations loaded without image: ${error.describe()}`);
      }

      if (image && (image.width !== project.frameWidth || image.height !== project.frameHeight)) {
        warnings.push(
          `Image size ${image.width}x${image.height} differs from recorded frame size ${project.frameWidth}x${project.frameHeight}`
        );
      }

      return { kind: 'project', annotationPath: path, project, image, warnings };
    });
    this.report('info', `Loading annotations ${path}`);
    return true;
  }

  /**
   * 어노테이션 파일 저장
   *
   * 커밋된 어노테이션만 저장 (그리던 것은 제외)
   */
  async exportAnnotations(path: string): Promise<OperationResult> {
    const format = tryDetectFormat(path);
    if (!format) {
      return this.exportFailure(unsupportedExtensionError(path));
    }

    const project = this.project;
    if (!project) {
      return this.exportFailure(new AnnotationIoError('No project to save', 'NO_PROJECT', path));
    }

    const text = exporter.encode(project, format);
    const count = project.annotationCount();

    try {
      await this.storage.writeText(path, text);
    } catch (e) {
      return this.exportFailure(AnnotationIoError.from(e, 'IO', path));
    }

    this.report('info', `Saved ${count} annotation(s) to ${path}`);
    return { success: true, errors: [], warnings: [] };
  }

  /**
   * 로드 채널 확인 (호스트가 사이클마다 호출)
   *
   * @returns 완료된 로드를 처리했으면 true
   */
  poll(): boolean {
    const outcome = this.channel.poll();
    if (!outcome) {
      return false;
    }

    const kind = this.pendingLoad;
    this.pendingLoad = null;

    if (!outcome.ok) {
      const what = kind === 'project' ? 'annotations' : 'image';
      this.report('error', `Failed to load ${what}: ${outcome.error.describe()}`);
      this.notify();
      return true;
    }

    const payload = outcome.value;
    switch (payload.kind) {
      case 'image':
        this.installProject(Project.create(payload.imagePath, payload.image.width, payload.image.height), payload.image);
        this.report('info', `Opened ${payload.imagePath} (${payload.image.width}x${payload.image.height})`);
        break;
      case 'project':
        this.installProject(payload.project, payload.image);
        for (const warning of payload.warnings) {
          this.report('warning', warning);
        }
        this.report(
          'info',
          `Loaded ${payload.project.annotationCount()} annotation(s) from ${payload.annotationPath}`
        );
        break;
    }
    return true;
  }

  isLoading(): boolean {
    return this.channel.isPending();
  }

  /**
   * 결과를 빨리 받기 위해 호스트가 계속 poll해야 하는지
   */
  needsContinuousPolling(): boolean {
    return this.isLoading();
  }

  // ---------------------------------------------------------------------------
  // Display
  // ---------------------------------------------------------------------------

  /**
   * 화면에 표시된 이미지 크기 (선택 반경 환산용)
   */
  setDisplaySize(width: number, height: number): void {
    this.displaySize = { width, height };
  }

  /**
   * 선택 반경 (정규화 좌표 단위)
   */
  getPickTolerance(): number {
    const size =
      this.displaySize ??
      (this.project ? { width: this.project.frameWidth, height: this.project.frameHeight } : null);
    if (!size) {
      return 0;
    }
    return pixelToleranceToNormalized(this.pickRadiusPx, size.width, size.height);
  }

  // ---------------------------------------------------------------------------
  // Read Access
  // ---------------------------------------------------------------------------

  /**
   * 렌더링 상태 (변경 전까지 같은 객체 반환)
   */
  getRenderState(): EditorRenderState {
    if (!this.renderState) {
      this.renderState = this.buildRenderState();
    }
    return this.renderState;
  }

  /**
   * 변경 구독
   *
   * @returns 구독 해제 함수
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getImage(): DecodedImage | null {
    return this.image;
  }

  getProject(): Project | null {
    return this.project;
  }

  getAnnotationCounter(): number {
    return this.annotationCounter;
  }

  getStatusMessages(): readonly StatusMessage[] {
    return [...this.statusMessages];
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * select 도구 누름
   *
   * 선택된 어노테이션의 꼭짓점 → 드래그 시작 / 삭제
   * 그 외 → 최상단 어노테이션 선택 (없으면 선택 해제)
   */
  private handleSelectPress(project: Project, point: Point, removing: boolean): void {
    const tolerance = this.getPickTolerance();
    const selectedIndex = this.selectedIndex;
    const selected = selectedIndex !== null ? project.getAnnotation(selectedIndex) : undefined;

    if (selected && selectedIndex !== null) {
      const vertexIndex = vertexWithinThreshold(selected.vertices, point, tolerance);
      if (vertexIndex !== null) {
        if (removing) {
          this.removeVertex(project, selected, vertexIndex);
        } else {
          this.history.push(project.annotations);
          this.dragTarget = { annotationIndex: selectedIndex, vertexIndex };
          this.notify();
        }
        return;
      }
    }

    if (removing) {
      return;
    }

    const hit = this.hitTest(project, point, tolerance);
    if (hit !== this.selectedIndex) {
      this.selectedIndex = hit;
      this.notify();
    }
  }

  private removeVertex(project: Project, annotation: Annotation, vertexIndex: number): void {
    if (annotation.vertexCount() - 1 < MIN_COMMITTED_VERTICES) {
      this.report('warning', `"${annotation.name}" needs at least ${MIN_COMMITTED_VERTICES} vertices`);
      return;
    }

    this.history.push(project.annotations);
    annotation.removeVertex(vertexIndex);
    this.notify();
  }

  /**
   * 최상단(마지막으로 그린) 어노테이션부터 검사
   */
  private hitTest(project: Project, point: Point, tolerance: number): number | null {
    const limit = tolerance * tolerance;

    for (let i = project.annotations.length - 1; i >= 0; i--) {
      const annotation = project.annotations[i];
      const closed = annotation.isClosed();

      if (distanceToPathSquared(annotation.vertices, point, closed) <= limit) {
        return i;
      }
      if (closed && pointInPolygon(annotation.vertices, point)) {
        return i;
      }
    }

    return null;
  }

  /**
   * undo/redo 결과 설치
   */
  private installAnnotations(project: Project, annotations: Annotation[]): void {
    project.replaceAnnotations(annotations);
    this.selectedIndex = null;
    this.dragTarget = null;
    this.notify();
  }

  /**
   * 로드된 프로젝트 설치 - 기존 프로젝트 통째로 교체
   */
  private installProject(project: Project, image: DecodedImage | null): void {
    this.project = project;
    this.image = image;
    this.history.clear();
    this.annotationCounter = project.annotationCount();
    this.selectedIndex = null;
    this.inProgress = null;
    this.dragTarget = null;
    this.notify();
  }

  private dispatch(kind: LoadKind, job: () => Promise<LoadPayload>): void {
    this.pendingLoad = kind;
    this.dragTarget = null;
    this.channel.dispatch(job);
    this.notify();
  }

  private async readAnnotationFile(path: string): Promise<string> {
    let exists: boolean;
    try {
      exists = await this.storage.exists(path);
    } catch (e) {
      throw AnnotationIoError.from(e, 'IO', path);
    }
    if (!exists) {
      throw new AnnotationIoError('Annotation file not found', 'IO', path);
    }

    try {
      return await this.storage.readText(path);
    } catch (e) {
      throw AnnotationIoError.from(e, 'IO', path);
    }
  }

  private reportNonFinitePoint(point: Point): void {
    this.report('warning', `Ignored pointer event with non-finite coordinates (${point.x}, ${point.y})`);
  }

  private exportFailure(error: AnnotationIoError): OperationResult {
    const message = `Failed to save annotations: ${error.describe()}`;
    this.report('error', message);
    return { success: false, errors: [message], warnings: [] };
  }

  /**
   * 상태 메시지 기록 (최근 maxStatusMessages개 유지)
   */
  private report(level: StatusLevel, text: string): void {
    const message: StatusMessage = { level, text, timestamp: Date.now() };

    this.statusMessages.push(message);
    while (this.statusMessages.length > this.maxStatusMessages) {
      this.statusMessages.shift();
    }

    if (this.logToConsole) {
      const line = `[AnnotationEditor] ${text}`;
      if (level === 'error') {
        console.error(line);
      } else if (level === 'warning') {
        console.warn(line);
      } else {
        console.info(line);
      }
    }

    this.onStatus?.(message);
  }

  private notify(): void {
    this.renderState = null;
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  private buildRenderState(): EditorRenderState {
    const project = this.project;
    const dragTarget = this.dragTarget;

    return Object.freeze({
      tool: this.tool,
      annotations: Object.freeze(project ? project.annotations.map(toRenderAnnotation) : []),
      inProgress: this.inProgress ? toRenderAnnotation(this.inProgress) : null,
      selectedIndex: this.selectedIndex,
      dragTarget: dragTarget ? Object.freeze({ ...dragTarget }) : null,
      isLoading: this.isLoading(),
      canUndo: this.history.canUndo(),
      canRedo: this.history.canRedo(),
      mediaFile: project ? project.mediaFile : null,
      frameSize: project ? Object.freeze({ width: project.frameWidth, height: project.frameHeight }) : null,
      hasImage: this.image !== null,
    });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function toRenderAnnotation(annotation: Annotation): RenderAnnotation {
  return Object.freeze({
    name: annotation.name,
    kind: annotation.kind,
    vertices: Object.freeze(annotation.vertices.map((p) => Object.freeze({ x: p.x, y: p.y }))),
    closed: annotation.isClosed(),
  });
}

function isParseError(message: string): boolean {
  return message.startsWith('JSON parse error') || message.startsWith('YAML parse error');
}
