import * as fs from 'node:fs';
import * as path from 'node:path';
import { PDFDocument } from 'pdf-lib';
import { BatchRenameError } from '../errors';
import { getLogger } from '../logger';

const logger = getLogger('pdf-split');

export interface PdfSplitOptions {
  source: string;
  outputDir: string;
  pagesPerChunk: number;
  onProgress?: (message: string) => void;
}

/**
 * 按固定页数拆分 PDF，输出 split_1.pdf、split_2.pdf …
 * 最后一个文件包含剩余页；失败时不清理已写出的文件。
 */
export async function splitPdf(options: PdfSplitOptions): Promise<string[]> {
  const { source, outputDir, pagesPerChunk, onProgress } = options;

  if (!Number.isInteger(pagesPerChunk) || pagesPerChunk < 1) {
    throw new BatchRenameError('SplitFailure', `每个文件的页数必须是正整数: ${pagesPerChunk}`, {
      pagesPerChunk,
    });
  }

  try {
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
      logger.info(`Created folder: ${outputDir}`);
    }

    const reader = await PDFDocument.load(await fs.promises.readFile(source));
    const totalPages = reader.getPageCount();
    const extension = path.extname(source).toLowerCase() || '.pdf';
    logger.info(`Total pages in ${source}: ${totalPages}`);
    onProgress?.(`📄 共 ${totalPages} 页，每 ${pagesPerChunk} 页拆分为一个文件`);

    const outputs: string[] = [];
    for (let start = 0; start < totalPages; start += pagesPerChunk) {
      const writer = await PDFDocument.create();
      const indices = Array.from({ length: Math.min(pagesPerChunk, totalPages - start) }, (_, i) => start + i);
      const pages = await writer.copyPages(reader, indices);
      pages.forEach((page) => writer.addPage(page));

      const outputPath = path.join(outputDir, `split_${outputs.length + 1}${extension}`);
      await fs.promises.writeFile(outputPath, await writer.save());
      outputs.push(outputPath);
      logger.info(`Generated file: ${outputPath}`);
      onProgress?.(`✅ ${path.basename(outputPath)}（${indices.length} 页）`);
    }

    return outputs;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Error splitting ${source}: ${errorMessage}`);
    throw new BatchRenameError('SplitFailure', `拆分 PDF 失败: ${errorMessage}`, { source });
  }
}
