import fs from 'node:fs/promises';
import path from 'node:path';
import { Logger } from '../../infrastructure/logging/logger.js';
import { TempWorkspaceManager } from '../../infrastructure/storage/TempWorkspaceManager.js';
import { DocumentReplacerRegistry } from '../../domain/services/IDocumentReplacer.js';
import { assertSearchText } from '../../domain/services/textReplace.js';
import { resolveDocumentFormat } from '../../domain/formats.js';
import { OUTPUT_NAMING } from '../../domain/constants/FileConstants.js';
import {
  OutputWriteError,
  ValidationError,
  errorMessage,
} from '../../domain/errors/DocumentErrors.js';
import {
  ReplacedDocument,
  ReplacementRequest,
  ReplacementResult,
  UploadedDocument,
} from '../../domain/types.js';

/**
 * 文档替换应用服务接口
 */
export interface IDocumentReplaceService {
  /**
   * 替换磁盘上的文件，输出写在源文件旁边
   */
  replaceInFile(request: ReplacementRequest): Promise<ReplacementResult>;

  /**
   * 替换上传的文件内容，返回修改后的内容与下载文件名
   */
  replaceUpload(
    upload: UploadedDocument,
    searchText: string,
    replacementText: string,
    logger?: Logger,
  ): Promise<ReplacedDocument>;
}

/**
 * 文档替换应用服务
 * @description 根据扩展名选择替换器；上传文件在独立的临时工作目录中处理，结束后立即清理
 */
export class DocumentReplaceService implements IDocumentReplaceService {
  /**
   * @param replacers - 格式到替换器的映射
   * @param workspaces - 临时工作目录管理器
   * @param logger - 日志记录器
   */
  constructor(
    private readonly replacers: DocumentReplacerRegistry,
    private readonly workspaces: TempWorkspaceManager,
    private readonly logger: Logger,
  ) {}

  public async replaceInFile(
    request: ReplacementRequest,
  ): Promise<ReplacementResult> {
    assertSearchText(request.searchText);
    const format = resolveDocumentFormat(request.sourcePath);
    return this.replacers[format].replace(
      request.sourcePath,
      request.searchText,
      request.replacementText,
    );
  }

  public async replaceUpload(
    upload: UploadedDocument,
    searchText: string,
    replacementText: string,
    logger: Logger = this.logger,
  ): Promise<ReplacedDocument> {
    const originalName = path.basename(upload.originalName);
    if (originalName === '') {
      throw new ValidationError('No file selected', { field: 'file' });
    }
    assertSearchText(searchText);
    // 不支持的扩展名在写任何文件之前就被拒绝
    const format = resolveDocumentFormat(originalName);

    logger.info(`开始处理上传文件: ${originalName}`, {
      format,
      size: upload.buffer.length,
    });

    return this.workspaces.run(async (workspace) => {
      const sourcePath = workspace.allocatePath(path.extname(originalName));
      try {
        await fs.writeFile(sourcePath, upload.buffer);
      } catch (error) {
        throw new OutputWriteError(
          `Failed to store uploaded file: ${errorMessage(error)}`,
        );
      }

      const result = await this.replacers[format].replace(
        sourcePath,
        searchText,
        replacementText,
      );

      let content: Buffer;
      try {
        content = await fs.readFile(result.outputPath);
      } catch (error) {
        throw new OutputWriteError(
          `Failed to read output file: ${errorMessage(error)}`,
        );
      }

      return {
        fileName: `${OUTPUT_NAMING.DOWNLOAD_PREFIX}${originalName}`,
        content,
        format,
        replacements: result.replacements,
      };
    });
  }
}
