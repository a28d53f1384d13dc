import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, writeWorkbook } from '../test/helpers';
import { handleCommand, parseCommand } from './cli-handlers';
import type { CliSession } from './cli-handlers';
import { BatchRenameWizard } from './wizard';

describe('parseCommand', () => {
  it('splits the command name from its arguments', () => {
    expect(parseCommand('  TOGGLE  Fiscal Year ')).toEqual({
      name: 'toggle',
      args: ['Fiscal', 'Year'],
      rest: ' Fiscal Year',
    });
  });

  it('returns null for blank or unknown input', () => {
    expect(parseCommand('   ')).toBeNull();
    expect(parseCommand('rename all')).toBeNull();
  });
});

describe('handleCommand', () => {
  let root: string;
  let output: string[];
  let session: CliSession;

  const run = async (line: string) => {
    const command = parseCommand(line);
    if (!command) throw new Error(`unparsed: ${line}`);
    return handleCommand(session, command);
  };

  beforeEach(() => {
    root = makeTempDir('cli');
    output = [];
    session = {
      wizard: new BatchRenameWizard({
        config: {
          allowedExtensions: ['.pdf'],
          spreadsheetExtensions: ['.xlsx'],
          splittableExtensions: ['.pdf'],
          splitDirectoryName: 'split',
          defaultPagesPerChunk: 1,
        },
      }),
      print: (message) => output.push(message),
      composer: null,
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('drives the wizard from folder selection to rename', async () => {
    const docs = path.join(root, 'my docs');
    fs.mkdirSync(docs);
    fs.writeFileSync(path.join(docs, 'a.pdf'), 'a');
    fs.writeFileSync(path.join(docs, 'b.pdf'), 'b');
    const sheet = path.join(root, 'data.xlsx');
    writeWorkbook(sheet, [
      ['Year', 'Name'],
      [2020, 'Alpha'],
      [2021, 'Beta'],
    ]);

    await run(`folder "${docs}"`);
    await run('next');
    await run(`data ${sheet}`);
    await run('toggle Name');
    await run('toggle Year');
    await run('next');
    await run('move Name 1');
    await run('sep 1 _');
    await run('accept');

    expect(output).toContain('✅ Name_Year.pdf');

    await run('next');
    await run('run');

    expect(fs.readdirSync(docs).sort()).toEqual(['Alpha_2020.pdf', 'Beta_2021.pdf']);
  });

  it('reports separator errors without throwing', async () => {
    const docs = path.join(root, 'docs');
    fs.mkdirSync(docs);
    fs.writeFileSync(path.join(docs, 'a.pdf'), 'a');
    fs.writeFileSync(path.join(docs, 'b.pdf'), 'b');
    const sheet = path.join(root, 'data.xlsx');
    writeWorkbook(sheet, [['A', 'B'], [1, 2], [3, 4]]);

    await run(`folder ${docs}`);
    await run('next');
    await run(`data ${sheet}`);
    await run('toggle A');
    await run('toggle B');
    await run('next');
    await run('sep 1 /');

    expect(output[output.length - 1]).toBe('❌ 分隔符包含无效字符: "/"');
  });

  it('returns false on quit', async () => {
    expect(await run('quit')).toBe(false);
  });
});
