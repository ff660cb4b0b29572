/**
 * Files Service
 */

import { parseResponse, type ExecutorProvider } from '@/modules/http';
import { fileEndpoints, resourceDefaults } from '../config';
import { FileExtractResultSchema, type FileExtractResult } from '../types';

export class FilesService {
  constructor(private readonly executor: ExecutorProvider) {}

  /**
   * Upload a document (PDF, DOCX, TXT, ...) and get its plain text back
   */
  async extractText(file: Uint8Array, filename: string = resourceDefaults.uploadFilename): Promise<FileExtractResult> {
    const data = await this.executor().execute('POST', fileEndpoints.extractText, {
      formParts: [{ name: 'file', filename, content: file }],
    });
    return parseResponse(FileExtractResultSchema, data, fileEndpoints.extractText);
  }
}
