import type { Interface } from 'node:readline/promises';
import type { ToolResult } from '@shared/types/common';
import { toFailure } from './errors';
import type { TemplateComposer } from './services/name-template';
import { STAGE_TRANSITIONS, WIZARD_STAGES } from './wizard';
import type { BatchRenameWizard } from './wizard';

export type CommandName =
  | 'folder'
  | 'data'
  | 'fields'
  | 'toggle'
  | 'sep'
  | 'move'
  | 'drop'
  | 'accept'
  | 'preview'
  | 'run'
  | 'next'
  | 'back'
  | 'status'
  | 'help'
  | 'quit';

export interface Command {
  name: CommandName;
  args: string[];
  /** 命令名之后的原始文本，用于包含空格的路径或分隔符 */
  rest: string;
}

const COMMAND_NAMES: readonly CommandName[] = [
  'folder',
  'data',
  'fields',
  'toggle',
  'sep',
  'move',
  'drop',
  'accept',
  'preview',
  'run',
  'next',
  'back',
  'status',
  'help',
  'quit',
];

const HELP_TEXT = [
  'folder <路径>          选择要处理的文件夹',
  'data <路径>            选择表格文件 (.xls / .xlsx)',
  'fields [关键字]        列出表格字段，[x] 表示已选',
  'toggle <字段>          选择或取消字段',
  'sep <序号> [文本]      设置第 n 个字段后的分隔符（从 1 开始）',
  'move <字段> <位置>     将字段移动到指定位置（从 1 开始）',
  'drop <字段> <x>        按拖放坐标移动字段',
  'accept                 保存当前文件名格式',
  'preview                预览重命名结果',
  'run                    开始重命名',
  'next / back            前进或后退一个阶段',
  'status                 显示当前汇总',
  'quit                   退出',
].join('\n');

function isCommandName(value: string): value is CommandName {
  return (COMMAND_NAMES as readonly string[]).includes(value);
}

/**
 * 解析一行输入，未知命令返回 null
 */
export function parseCommand(line: string): Command | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const match = /^(\S+)\s?(.*)$/.exec(trimmed);
  if (!match) return null;

  const name = match[1].toLowerCase();
  if (!isCommandName(name)) return null;

  const rest = match[2];
  return { name, args: rest.split(/\s+/).filter(Boolean), rest };
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  return /^(['"]).*\1$/.test(trimmed) ? trimmed.slice(1, -1) : trimmed;
}

export interface CliSession {
  wizard: BatchRenameWizard;
  print: (message: string) => void;
  composer: TemplateComposer | null;
}

function report(session: CliSession, result: ToolResult): void {
  if (result.success) {
    session.print(`✅ ${result.summary ?? '完成'}`);
  } else {
    session.print(`❌ ${result.error}`);
  }
}

export function stageHeader(wizard: BatchRenameWizard): string {
  const { stage } = wizard.state;
  return `\n[阶段 ${wizard.stageIndex + 1}/${WIZARD_STAGES.length}] ${STAGE_TRANSITIONS[stage].title}`;
}

function printComposer(session: CliSession, composer: TemplateComposer): void {
  const parts = composer.fields.map((field, i) => {
    const separator = composer.separatorTexts[i];
    return separator === undefined ? `[${field}]` : `[${field}]「${separator}」`;
  });
  session.print(`格式: ${parts.join(' ')} ${composer.extension}`);
  session.print(`预览: ${composer.toString() || '(空)'}`);
}

function ensureComposer(session: CliSession): TemplateComposer {
  if (!session.composer) {
    session.composer = session.wizard.openComposer();
  }
  return session.composer;
}

/**
 * 执行一条命令，返回 false 表示退出
 */
export async function handleCommand(session: CliSession, command: Command): Promise<boolean> {
  const { wizard } = session;

  try {
    switch (command.name) {
      case 'folder':
        report(session, await wizard.selectFolder(stripQuotes(command.rest)));
        break;

      case 'data':
        report(session, await wizard.selectSpreadsheet(stripQuotes(command.rest)));
        break;

      case 'fields': {
        const selected = new Set(wizard.state.selectedFields);
        const fields = wizard.listFields(command.rest);
        session.print(fields.length > 0 ? fields.map((f) => `${selected.has(f) ? '[x]' : '[ ]'} ${f}`).join('\n') : '没有字段');
        break;
      }

      case 'toggle':
        report(session, wizard.toggleField(stripQuotes(command.rest)));
        break;

      case 'sep': {
        const composer = ensureComposer(session);
        const match = /^(\S+)\s?(.*)$/.exec(command.rest);
        composer.setSeparator(Number(match?.[1]) - 1, stripQuotes(match?.[2] ?? ''));
        printComposer(session, composer);
        break;
      }

      case 'move':
      case 'drop': {
        const composer = ensureComposer(session);
        const position = Number(command.args[command.args.length - 1]);
        const field = command.args.slice(0, -1).join(' ');
        if (!composer.fields.includes(field) || Number.isNaN(position)) {
          session.print(`❌ 用法: ${command.name} <字段> <${command.name === 'move' ? '位置' : 'x'}>`);
          break;
        }
        if (command.name === 'move') {
          composer.moveField(field, position - 1);
        } else {
          composer.dropField(field, position);
        }
        printComposer(session, composer);
        break;
      }

      case 'accept':
        report(session, wizard.acceptTemplate(ensureComposer(session)));
        break;

      case 'preview':
        report(session, await wizard.preview());
        break;

      case 'run':
        report(session, await wizard.execute());
        break;

      case 'next':
      case 'back': {
        const result = command.name === 'next' ? wizard.next() : wizard.back();
        report(session, result);
        if (result.success) {
          session.print(stageHeader(wizard));
          session.composer = wizard.state.stage === 'build-format' ? wizard.openComposer() : null;
          if (session.composer) {
            printComposer(session, session.composer);
          }
        }
        break;
      }

      case 'status':
        session.print(stageHeader(wizard));
        session.print(wizard.summary());
        break;

      case 'help':
        session.print(HELP_TEXT);
        break;

      case 'quit':
        return false;
    }
  } catch (error) {
    report(session, toFailure(error));
  }

  return true;
}

/**
 * 交互式运行向导，直到用户退出或输入结束
 */
export async function runInteractive(rl: Interface, session: CliSession): Promise<void> {
  session.print(stageHeader(session.wizard));
  session.print(HELP_TEXT);
  rl.setPrompt('> ');
  rl.prompt();

  for await (const line of rl) {
    const command = parseCommand(line);
    if (!command) {
      if (line.trim()) session.print('❓ 未知命令，输入 help 查看帮助');
    } else if (!(await handleCommand(session, command))) {
      rl.close();
      return;
    }
    rl.prompt();
  }
}
