import * as path from 'node:path';
import type {
  BatchRenameConfig,
  DataTable,
  FileEntry,
  NameTemplate,
  RenamePlanEntry,
  RenameSummary,
  WizardStage,
} from '@shared/types/batch-rename';
import type { ToolResult } from '@shared/types/common';
import { BatchRenameError, toFailure } from './errors';
import { getLogger } from './logger';
import { discoverFiles, toFileEntry } from './services/file-set';
import { planRenames, renameFiles } from './services/file-rename';
import { generateNames } from './services/name-generator';
import { TemplateComposer, filterFields, formatTemplate, toggleField, validateTemplate } from './services/name-template';
import { splitPdf } from './services/pdf-split';
import { assertSpreadsheetPath, loadDataTable } from './services/spreadsheet';

const logger = getLogger('wizard');

export const WIZARD_STAGES: readonly WizardStage[] = ['select-folder', 'select-data', 'build-format', 'confirm'];

interface StageTransition {
  next: WizardStage | null;
  prev: WizardStage | null;
  title: string;
}

export const STAGE_TRANSITIONS: Record<WizardStage, StageTransition> = {
  'select-folder': { next: 'select-data', prev: null, title: '选择要处理的文件夹' },
  'select-data': { next: 'build-format', prev: 'select-folder', title: '选择表格文件与字段' },
  'build-format': { next: 'confirm', prev: 'select-data', title: '定义输出文件名格式' },
  confirm: { next: null, prev: 'build-format', title: '确认并开始重命名' },
};

export interface WizardState {
  stage: WizardStage;
  folder: string | null;
  files: FileEntry[];
  extension: string;
  spreadsheet: string | null;
  table: DataTable | null;
  selectedFields: string[];
  template: NameTemplate | null;
}

export interface WizardOptions {
  config: BatchRenameConfig;
  onProgress?: (message: string) => void;
  onConfirm?: (message: string) => Promise<boolean>;
  onInputRequired?: (prompt: string) => Promise<string>;
}

export type PreviewResult = ToolResult & { plan?: RenamePlanEntry[] };

function createInitialState(): WizardState {
  return {
    stage: 'select-folder',
    folder: null,
    files: [],
    extension: '',
    spreadsheet: null,
    table: null,
    selectedFields: [],
    template: null,
  };
}

/**
 * 批量重命名向导
 *
 * 四个阶段线性推进，只能前进或后退一步；每个阶段满足就绪条件后才允许前进。
 * 所有操作失败时返回失败结果并停留在当前阶段。
 */
export class BatchRenameWizard {
  private current: WizardState = createInitialState();
  private readonly options: WizardOptions;

  constructor(options: WizardOptions) {
    this.options = options;
  }

  get state(): Readonly<WizardState> {
    return this.current;
  }

  get stageIndex(): number {
    return WIZARD_STAGES.indexOf(this.current.stage);
  }

  isStageReady(stage: WizardStage = this.current.stage): boolean {
    const state = this.current;
    switch (stage) {
      case 'select-folder':
        return state.folder !== null && state.files.length > 1;
      case 'select-data':
        return state.spreadsheet !== null && state.selectedFields.length > 0;
      case 'build-format':
        return state.template !== null && formatTemplate(state.template) !== '';
      case 'confirm':
        return false;
    }
  }

  canGoBack(): boolean {
    return STAGE_TRANSITIONS[this.current.stage].prev !== null;
  }

  next(): ToolResult {
    const { next } = STAGE_TRANSITIONS[this.current.stage];
    if (next === null) {
      return { success: false, error: '已经是最后一个阶段', code: 'InvalidStage' };
    }
    if (!this.isStageReady()) {
      return { success: false, error: `当前阶段尚未完成: ${STAGE_TRANSITIONS[this.current.stage].title}`, code: 'InvalidStage' };
    }
    this.current = { ...this.current, stage: next };
    return { success: true, summary: STAGE_TRANSITIONS[next].title };
  }

  back(): ToolResult {
    const { prev } = STAGE_TRANSITIONS[this.current.stage];
    if (prev === null) {
      return { success: false, error: '已经是第一个阶段', code: 'InvalidStage' };
    }
    this.current = { ...this.current, stage: prev };
    return { success: true, summary: STAGE_TRANSITIONS[prev].title };
  }

  private assertStage(stage: WizardStage): void {
    if (this.current.stage !== stage) {
      throw new BatchRenameError(
        'InvalidStage',
        `该操作只能在「${STAGE_TRANSITIONS[stage].title}」阶段执行`,
        { expected: stage, actual: this.current.stage },
      );
    }
  }

  private fail(action: string, error: unknown): ToolResult {
    const failure = toFailure(error);
    logger.error(`${action} failed: ${failure.error ?? ''}`);
    return failure;
  }

  /**
   * 选择文件夹；如果只有一个可拆分的文件，询问是否拆分
   */
  async selectFolder(directory: string): Promise<ToolResult> {
    try {
      this.assertStage('select-folder');
      const { config, onProgress } = this.options;
      const folder = path.resolve(directory);

      this.current = { ...this.current, folder: null, files: [], extension: '' };
      onProgress?.('📂 正在读取目录...');
      let found = discoverFiles(folder, config.allowedExtensions);
      let target = folder;

      // 只使用本次拆分生成的文件，输出目录中遗留的旧文件不参与重命名
      if (found.files.length === 1 && config.splittableExtensions.includes(found.extension)) {
        const split = await this.offerSplit(folder, found.files[0].path);
        found = { files: split.outputs.map(toFileEntry), extension: found.extension };
        target = split.outputDir;
      }

      this.current = { ...this.current, folder: target, files: found.files, extension: found.extension };
      onProgress?.(`📊 找到 ${found.files.length} 个文件`);

      if (found.files.length < 2) {
        return { success: false, error: '至少需要两个文件才能继续', code: 'EmptySet' };
      }
      return { success: true, summary: `找到 ${found.files.length} 个文件` };
    } catch (error) {
      return this.fail('selectFolder', error);
    }
  }

  private async offerSplit(folder: string, file: string): Promise<{ outputDir: string; outputs: string[] }> {
    const { config, onConfirm, onInputRequired, onProgress } = this.options;
    const name = path.basename(file);

    const accepted = (await onConfirm?.(`只找到一个文件 ${name}，是否将其拆分？`)) ?? false;
    if (!accepted) {
      throw new BatchRenameError('EmptySet', '文件未拆分，无法处理单个文件', { path: file });
    }

    const answer = (await onInputRequired?.(`每个文件的页数（默认 ${config.defaultPagesPerChunk}）`)) ?? '';
    const pagesPerChunk = answer.trim() === '' ? config.defaultPagesPerChunk : Number(answer.trim());

    const outputDir = path.join(folder, config.splitDirectoryName);
    onProgress?.(`✂️  正在拆分 ${name} 到 ${outputDir}`);
    const outputs = await splitPdf({ source: file, outputDir, pagesPerChunk, onProgress });
    return { outputDir, outputs };
  }

  /**
   * 选择表格文件，替换之前的数据表并清空已选字段与模板
   */
  async selectSpreadsheet(filePath: string): Promise<ToolResult> {
    try {
      this.assertStage('select-data');
      const { config, onProgress } = this.options;
      const resolved = path.resolve(filePath);

      assertSpreadsheetPath(resolved, config.spreadsheetExtensions);
      onProgress?.('📑 正在读取表格...');
      const table = loadDataTable(resolved);

      if (table.columns.length === 0 || table.rows.length === 0) {
        throw new BatchRenameError('EmptyTable', `表格中没有数据: ${resolved}`, { path: resolved });
      }

      this.current = { ...this.current, spreadsheet: resolved, table, selectedFields: [], template: null };
      return { success: true, summary: `读取 ${table.rows.length} 行，${table.columns.length} 列` };
    } catch (error) {
      return this.fail('selectSpreadsheet', error);
    }
  }

  listFields(query = ''): string[] {
    return filterFields(this.current.table?.columns ?? [], query);
  }

  toggleField(field: string): ToolResult {
    try {
      this.assertStage('select-data');
      const { table } = this.current;
      if (!table || !table.columns.includes(field)) {
        throw new BatchRenameError('MissingColumn', `表格中没有该列: ${field}`, { missing: [field] });
      }

      const selection = toggleField(new Set(this.current.selectedFields), field);
      const selectedFields = table.columns.filter((column) => selection.has(column));
      this.current = { ...this.current, selectedFields, template: null };

      logger.info(`Selected items: ${selectedFields.join(', ')}`);
      return { success: true, summary: `已选择 ${selectedFields.length} 个字段` };
    } catch (error) {
      return this.fail('toggleField', error);
    }
  }

  /**
   * 每次打开都会按所选字段重新创建编辑器
   */
  openComposer(): TemplateComposer {
    this.assertStage('build-format');
    return new TemplateComposer(this.current.selectedFields, this.current.extension);
  }

  acceptTemplate(composer: TemplateComposer): ToolResult {
    try {
      this.assertStage('build-format');
      const template = composer.build();
      validateTemplate(template);

      const text = formatTemplate(template);
      if (!text) {
        this.current = { ...this.current, template: null };
        return { success: false, error: '未定义文件名格式' };
      }

      this.current = { ...this.current, template };
      logger.info(`Selected filename format: ${text}`);
      return { success: true, summary: text };
    } catch (error) {
      return this.fail('acceptTemplate', error);
    }
  }

  private generate(): string[] {
    const { folder, table, template, selectedFields } = this.current;
    if (folder === null) {
      throw new BatchRenameError('InvalidStage', '尚未选择文件夹，请返回第一阶段重新选择');
    }
    if (!table || !template) {
      throw new BatchRenameError('InvalidStage', '尚未选择表格或文件名格式');
    }
    return generateNames(table, selectedFields, template);
  }

  /**
   * 预览模式执行重命名，只输出结果不修改文件
   */
  async preview(): Promise<PreviewResult> {
    try {
      this.assertStage('confirm');
      const { plan } = await renameFiles({
        files: this.current.files.map((file) => file.path),
        names: this.generate(),
        dryRun: true,
        onProgress: this.options.onProgress,
      });
      return { success: true, summary: `共 ${plan.length} 个文件`, plan };
    } catch (error) {
      return this.fail('preview', error);
    }
  }

  async execute(): Promise<ToolResult> {
    try {
      this.assertStage('confirm');
      const files = this.current.files.map((file) => file.path);
      const names = this.generate();
      // 预检失败时磁盘未改动，文件列表保持不变
      planRenames(files, names);

      let summary: RenameSummary;
      try {
        summary = await renameFiles({ files, names, onProgress: this.options.onProgress });
      } catch (error) {
        // 部分文件可能已被重命名，原文件列表不再可信，需要重新选择文件夹
        this.current = { ...this.current, folder: null, files: [], extension: '' };
        throw error;
      }

      const renamedFiles = summary.plan.map((entry) => ({
        ...this.current.files[entry.index],
        path: entry.destination,
        sortKey: entry.destination,
      }));
      this.current = { ...this.current, files: renamedFiles };
      return { success: true, summary: `重命名完成，共 ${summary.renamed} 个文件` };
    } catch (error) {
      return this.fail('execute', error);
    }
  }

  summary(): string {
    const { folder, spreadsheet, selectedFields, template, files } = this.current;
    return [
      `• 文件夹: ${folder ?? '未选择'}${folder ? `（${files.length} 个文件）` : ''}`,
      `• 表格文件: ${spreadsheet ?? '未选择'}`,
      `• 已选字段: ${selectedFields.length > 0 ? selectedFields.join(', ') : '未选择'}`,
      `• 输出文件名格式: ${template ? formatTemplate(template) : '未定义'}`,
    ].join('\n');
  }
}
