import { Injectable, Inject, Logger } from '@nestjs/common';
import pdfParse from 'pdf-parse';
import { ExtractedDocument } from '../../common/interfaces';

export interface UploadConfig {
  maxUploadBytes: number;
  minCharsPerPage: number;
}

export class DocumentTooLargeError extends Error {
  constructor(
    public readonly byteSize: number,
    public readonly maxBytes: number,
  ) {
    super(`Document is ${byteSize} bytes, the limit is ${maxBytes} bytes`);
    this.name = 'DocumentTooLargeError';
  }
}

export class DocumentParseError extends Error {
  constructor(fileName: string, reason: string) {
    super(`Failed to parse PDF ${fileName}: ${reason}`);
    this.name = 'DocumentParseError';
  }
}

@Injectable()
export class PdfParserService {
  private readonly logger = new Logger(PdfParserService.name);

  constructor(@Inject('UPLOAD_CONFIG') private readonly config: UploadConfig) {}

  /**
   * Parse a PDF from buffer (for uploaded files)
   */
  async parsePdfBuffer(buffer: Buffer, fileName: string): Promise<ExtractedDocument> {
    if (buffer.length > this.config.maxUploadBytes) {
      throw new DocumentTooLargeError(buffer.length, this.config.maxUploadBytes);
    }

    let text: string;
    let numPages: number;
    try {
      const data = await pdfParse(buffer);
      text = this.cleanText(data.text);
      numPages = data.numpages;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to parse PDF buffer: ${fileName}`, message);
      throw new DocumentParseError(fileName, message);
    }

    const result: ExtractedDocument = {
      text,
      numPages,
      fileName,
      byteSize: buffer.length,
      readable: this.isReadable(text, numPages),
    };

    this.logger.log(
      `Parsed PDF buffer: ${result.fileName} (${result.numPages} pages, ${result.text.length} chars, readable=${result.readable})`,
    );
    return result;
  }

  // Scanned or image-only PDFs yield almost no text per page
  isReadable(text: string, numPages: number): boolean {
    const visible = text.replace(/\s/g, '').length;
    return visible / Math.max(1, numPages) >= this.config.minCharsPerPage;
  }

  /**
   * Clean extracted text, keeping line breaks for section detection
   */
  private cleanText(text: string): string {
    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F]/g, '')
      .replace(/[ \t]+\n/g, '\n')
      .trim();
  }
}
